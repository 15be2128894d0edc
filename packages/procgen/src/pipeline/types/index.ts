export * from "./artifacts";
export * from "./pipeline";
export * from "./trace";
