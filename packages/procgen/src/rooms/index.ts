export * from "./room";
export * from "./types";
