import type { GeocodeHints, GeocodeResult, Geocoder } from "../geocoder.js";
import type { NeighborhoodStore } from "../store.js";
import type { Neighborhood, NeighborhoodSet } from "../types.js";

export class MemoryStore implements NeighborhoodStore {
  saves = 0;

  constructor(private items: Neighborhood[] = []) {}

  load(): Neighborhood[] {
    return [...this.items];
  }

  save(neighborhoods: NeighborhoodSet): void {
    this.items = [...neighborhoods];
    this.saves++;
  }
}

export class FakeGeocoder implements Geocoder {
  calls: { address: string; hints?: GeocodeHints }[] = [];

  constructor(private readonly results: Record<string, GeocodeResult> = {}) {}

  async geocode(address: string, hints?: GeocodeHints): Promise<GeocodeResult | null> {
    this.calls.push({ address, hints });
    return this.results[address] ?? null;
  }
}

export const geocoding = {
  region: "il",
  language: "iw",
  country: "ישראל",
  countryAliases: ["israel"],
};

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
