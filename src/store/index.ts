import { AppConfig } from "../config";
import { SqliteStore } from "./sqliteStore";
import { ResearchStore } from "./types";

export function createStore(config: AppConfig): ResearchStore {
  return new SqliteStore(config.storePath);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";
