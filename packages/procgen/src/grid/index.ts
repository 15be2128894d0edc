export * from "./room-grid";
