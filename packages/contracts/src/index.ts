export * from "./random/random-source";
export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/layout";
export * from "./schemas/seed";
export * from "./types/error";
export * from "./types/layout";
export * from "./types/result";
export * from "./utils/builder";
