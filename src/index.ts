/**
 * schemawright: OpenAPI schema resolution and C# declaration synthesis
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/naming/index.js";
export * from "./lib/resolver/index.js";
export * from "./lib/literals/index.js";
export * from "./lib/diagnostics/index.js";
export * from "./lib/synthesizer/index.js";
export * from "./lib/loader/index.js";
export * from "./lib/reporter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export { loadGeneratorOptions } from "./utils/config-loader.js";
