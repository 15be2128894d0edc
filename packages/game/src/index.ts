/**
 * Runtime side of the dungeon: room events, encounters, room controllers
 * and the floor manager that drives generation floor by floor.
 */

export * from "./encounter";
export * from "./events";
export * from "./floor";
export * from "./rooms";
