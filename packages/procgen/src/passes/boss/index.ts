export * from "./assign-item-room";
export * from "./isolate-boss";
