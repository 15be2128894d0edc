/**
 * Layout generators
 */

export * from "./room-walk";
