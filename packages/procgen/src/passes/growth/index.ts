export * from "./grow-rooms";
