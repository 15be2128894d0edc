export * from "./compiler";
export * from "./tile-writer";
