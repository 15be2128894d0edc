export * from "./room-events";
