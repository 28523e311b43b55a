import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { buildTagTable, parseTagTableConfig, type TagTable } from "@usfx-tsv/core";

const envSchema = z.object({
  USFX_SOURCE_PATH: z.string().trim().min(1).optional(),
});

export function resolveProjectRoot(cwd = process.cwd()): string {
  const cliSuffix = `${path.sep}apps${path.sep}cli`;
  if (cwd.endsWith(cliSuffix)) {
    return path.resolve(cwd, "../..");
  }
  return cwd;
}

export function loadTagTable(root = resolveProjectRoot()): TagTable {
  const file = path.join(root, "config", "usfx-tags.json");
  return buildTagTable(parseTagTableConfig(JSON.parse(fs.readFileSync(file, "utf8"))));
}

export function getSourcePath(root = resolveProjectRoot(), env: NodeJS.ProcessEnv = process.env): string {
  const { USFX_SOURCE_PATH } = envSchema.parse(env);
  return USFX_SOURCE_PATH ? path.resolve(root, USFX_SOURCE_PATH) : path.join(root, "xml", "source.xml");
}
