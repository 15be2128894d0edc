export * from "./floor-manager";
export * from "./progress-store";
