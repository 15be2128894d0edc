export * from "./bfs-distance";
