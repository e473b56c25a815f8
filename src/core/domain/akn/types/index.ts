// Loading this module registers every document type.
export * from "./hierarchical.ts";
export * from "./collection.ts";
export * from "./open.ts";
export * from "./debate.ts";
export * from "./judgment.ts";
export * from "./amendment.ts";
export * from "./portion.ts";
