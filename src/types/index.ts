// Core re-exports for the schemawright type system
// This file provides a single import point for all project types

export * from "./schema.js";
export * from "./declarations.js";
export * from "./config.js";
export type * from "../lib/synthesizer/types.js";
export type * from "../lib/reporter/types.js";
