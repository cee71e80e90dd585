/**
 * Tools system - public API.
 */

export * from "./types.ts";
export * from "./errors.ts";
export * from "./registry.ts";
export * from "./executor.ts";
export * from "./builtins/index.ts";
