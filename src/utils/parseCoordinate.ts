import { InvalidCoordinateError } from "../errors.js";
import { toCoordinate } from "../geo.js";
import type { Coordinate } from "../types.js";

/** Parses "lat,lng" text such as "32.0853,34.7818" */
export function parseCoordinate(input: string): Coordinate {
  const parts = input.split(",");
  if (parts.length !== 2) {
    throw new InvalidCoordinateError(input);
  }
  return toCoordinate(parts[0].trim(), parts[1].trim());
}
