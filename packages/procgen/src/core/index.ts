/**
 * Core module - foundational primitives for room layouts.
 */

export * from "./geometry";
export * from "./graph";
export * from "./hash";
export * from "./tiles";
