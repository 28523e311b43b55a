import { z } from "zod";
import type { StructuralRole, TagKind, TagTable } from "./types.js";

const tagName = z.string().trim().min(1);

const markerSchema = z.object({
  tags: z.array(tagName).min(1),
  attribute: tagName.default("id"),
});

export const tagTableConfigSchema = z
  .object({
    unknownTags: z.enum(["content", "annotation"]).default("content"),
    structural: z.object({
      book: markerSchema,
      chapter: markerSchema,
      verse: markerSchema,
      verseEnd: z.object({ tags: z.array(tagName) }).default({ tags: [] }),
    }),
    annotation: z.array(tagName).default([]),
    content: z
      .object({
        block: z.array(tagName).default([]),
        inline: z.array(tagName).default([]),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    const all = [
      ...config.structural.book.tags,
      ...config.structural.chapter.tags,
      ...config.structural.verse.tags,
      ...config.structural.verseEnd.tags,
      ...config.annotation,
      ...config.content.block,
      ...config.content.inline,
    ];
    for (const name of all) {
      if (seen.has(name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Tag <${name}> is listed more than once` });
      }
      seen.add(name);
    }
  });

export type TagTableConfig = z.infer<typeof tagTableConfigSchema>;

export function parseTagTableConfig(raw: unknown): TagTableConfig {
  return tagTableConfigSchema.parse(raw);
}

export function buildTagTable(config: TagTableConfig): TagTable {
  const tags = new Map<string, TagKind>();
  const roles: Array<Exclude<StructuralRole, "verseEnd">> = ["book", "chapter", "verse"];

  for (const role of roles) {
    const marker = config.structural[role];
    for (const name of marker.tags) {
      tags.set(name, { type: "Structural", role, attribute: marker.attribute });
    }
  }
  for (const name of config.structural.verseEnd.tags) {
    tags.set(name, { type: "Structural", role: "verseEnd", attribute: "" });
  }
  for (const name of config.annotation) {
    tags.set(name, { type: "Annotation" });
  }
  for (const name of config.content.block) {
    tags.set(name, { type: "ContentBearing", block: true });
  }
  for (const name of config.content.inline) {
    tags.set(name, { type: "ContentBearing", block: false });
  }

  return {
    tags,
    unknown: config.unknownTags === "annotation" ? { type: "Annotation" } : { type: "ContentBearing", block: false },
  };
}

export function classifyTag(table: TagTable, name: string): TagKind {
  return table.tags.get(name) ?? table.unknown;
}
