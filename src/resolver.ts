import { insidePolygon } from "./geo.js";
import type { Coordinate, MatchMode, NeighborhoodSet } from "./types.js";

/** Name of the first neighborhood (in list order) containing the point */
export function findFirst(point: Coordinate, neighborhoods: NeighborhoodSet): string | null {
  for (const { name, polygon } of neighborhoods) {
    if (insidePolygon(point, polygon)) return name;
  }
  return null;
}

/** Names of every neighborhood containing the point, in list order */
export function findAll(point: Coordinate, neighborhoods: NeighborhoodSet): string[] {
  return neighborhoods.filter(({ polygon }) => insidePolygon(point, polygon)).map(({ name }) => name);
}

export function resolve(point: Coordinate, neighborhoods: NeighborhoodSet, mode: "first"): string | null;
export function resolve(point: Coordinate, neighborhoods: NeighborhoodSet, mode: "all"): string[];
export function resolve(point: Coordinate, neighborhoods: NeighborhoodSet, mode: MatchMode): string | null | string[];
export function resolve(point: Coordinate, neighborhoods: NeighborhoodSet, mode: MatchMode): string | null | string[] {
  return mode === "first" ? findFirst(point, neighborhoods) : findAll(point, neighborhoods);
}
