import { openDatabase } from "./db.js";
import { SqliteNeighborhoodStore } from "./dbHelpers.js";
import { JsonFileStore } from "./jsonStore.js";
import type { Neighborhood, NeighborhoodSet } from "./types.js";
import type { Config } from "./config.js";

/** Persistence port. `save` always replaces the whole collection. */
export interface NeighborhoodStore {
  load(): Neighborhood[];
  save(neighborhoods: NeighborhoodSet): void;
}

export function createStore(cfg: Pick<Config, "storage" | "neighborhoodsFile" | "dbPath">): NeighborhoodStore {
  if (cfg.storage === "sqlite") {
    console.log(`Using SQLite neighborhood store at ${cfg.dbPath}`);
    return new SqliteNeighborhoodStore(openDatabase(cfg.dbPath));
  }
  console.log(`Using JSON neighborhood store at ${cfg.neighborhoodsFile}`);
  return new JsonFileStore(cfg.neighborhoodsFile);
}
