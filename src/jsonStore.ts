import fs from "fs";
import path from "path";
import { AppError } from "./errors.js";
import { decodeNeighborhood, encodeNeighborhood } from "./geo.js";
import type { NeighborhoodStore } from "./store.js";
import type { Neighborhood, NeighborhoodSet, StoredNeighborhood } from "./types.js";

interface NeighborhoodFile {
  neighborhoods: StoredNeighborhood[];
}

/** Flat JSON file, rewritten in full on every save */
export class JsonFileStore implements NeighborhoodStore {
  constructor(private readonly filePath: string) {}

  load(): Neighborhood[] {
    if (!fs.existsSync(this.filePath)) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    } catch (err) {
      console.error(`Could not parse ${this.filePath}:`, (err as Error).message);
      throw AppError.internal(`Neighborhood file ${this.filePath} is not valid JSON`, "STORE_CORRUPT");
    }

    if (typeof parsed !== "object" || parsed === null || !("neighborhoods" in parsed) || !Array.isArray(parsed.neighborhoods)) {
      throw AppError.internal(`Neighborhood file ${this.filePath} has no neighborhoods list`, "STORE_CORRUPT");
    }
    return parsed.neighborhoods.map(decodeNeighborhood);
  }

  save(neighborhoods: NeighborhoodSet): void {
    const file: NeighborhoodFile = { neighborhoods: neighborhoods.map(encodeNeighborhood) };
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(file, null, 2), "utf8");
  }
}
