export * from "./client";
export * from "./responseParser";
export * from "./types";
