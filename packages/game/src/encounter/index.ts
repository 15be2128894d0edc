export * from "./encounter";
