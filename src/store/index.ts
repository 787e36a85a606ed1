import { AppConfig } from "../config";
import { SqliteRunStore } from "./sqliteStore";
import { RunStore } from "./types";

export function createRunStore(config: Pick<AppConfig, "storePath">): RunStore {
  return new SqliteRunStore(config.storePath);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";
