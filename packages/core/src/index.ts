export * from "./types.js";
export * from "./errors.js";
export * from "./text.js";
export * from "./verse-label.js";
export * from "./tag-table.js";
export * from "./extractor.js";
export * from "./tsv.js";
