export * from "./dump";
export * from "./dungeon-layout";
