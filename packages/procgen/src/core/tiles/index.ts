export * from "./tile-grid";
export * from "./types";
