export * from "./abbreviations";
export * from "./analysis";
export * from "./boundaries";
export * from "./chunker";
export * from "./config";
export * from "./env";
export * from "./errors";
export * from "./fixed-splitter";
export * from "./helpers";
export * from "./ingest";
export * from "./logger";
export * from "./normalizer";
export * from "./pipeline";
// (internal) file-utils kept out of the public export

// Re-export selected type-only modules for public consumption
export type * from "../types/analysis";
export type * from "../types/chunker";
export type * from "../types/document";
export type * from "../types/logger";
// env types stay internal
