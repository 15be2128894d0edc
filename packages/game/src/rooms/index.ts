export * from "./room-behavior";
export * from "./room-controller";
