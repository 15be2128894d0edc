/**
 * Pipeline module - composable generation pipelines.
 */

export * from "./builder";
export * from "./counting-random";
export * from "./trace";
export * from "./types";
