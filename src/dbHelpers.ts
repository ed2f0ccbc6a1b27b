import type Database from "better-sqlite3";
import { AppError } from "./errors.js";
import { decodeNeighborhood, encodeNeighborhood } from "./geo.js";
import type { NeighborhoodStore } from "./store.js";
import type { Neighborhood, NeighborhoodSet } from "./types.js";

interface NeighborhoodRow {
  name: string;
  polygon: string;
}

interface NeighborhoodInsert {
  position: number;
  name: string;
  polygon: string;
}

export class SqliteNeighborhoodStore implements NeighborhoodStore {
  private readonly selectAll: Database.Statement<[], NeighborhoodRow>;
  private readonly replaceAll: (neighborhoods: NeighborhoodSet) => void;

  constructor(db: Database.Database) {
    this.selectAll = db.prepare<[], NeighborhoodRow>("SELECT name, polygon FROM neighborhoods ORDER BY position, id");
    const insert = db.prepare<NeighborhoodInsert>(
      "INSERT INTO neighborhoods (position, name, polygon) VALUES (@position, @name, @polygon)"
    );
    const clear = db.prepare("DELETE FROM neighborhoods");

    this.replaceAll = db.transaction((neighborhoods: NeighborhoodSet) => {
      clear.run();
      neighborhoods.forEach((neighborhood, position) => {
        const { name, coordinates } = encodeNeighborhood(neighborhood);
        insert.run({ position, name, polygon: JSON.stringify(coordinates) });
      });
    });
  }

  load(): Neighborhood[] {
    return this.selectAll.all().map(({ name, polygon }) => {
      let coordinates: unknown;
      try {
        coordinates = JSON.parse(polygon);
      } catch (err) {
        console.error(`Could not parse polygon of neighborhood "${name}":`, (err as Error).message);
        throw AppError.internal(`Stored polygon of "${name}" is not valid JSON`, "STORE_CORRUPT");
      }
      return decodeNeighborhood({ name, coordinates });
    });
  }

  save(neighborhoods: NeighborhoodSet): void {
    this.replaceAll(neighborhoods);
  }
}
