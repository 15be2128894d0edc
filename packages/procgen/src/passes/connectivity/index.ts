export * from "./connect-adjacent";
export * from "./reachability";
export * from "./repair-connectivity";
