import { AppError, InvalidCoordinateError } from "./errors.js";
import type { Coordinate, Neighborhood, Polygon, StoredNeighborhood } from "./types.js";

function toDegrees(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Builds a frozen coordinate; accepts numbers and numeric strings only */
export function toCoordinate(lat: unknown, lng: unknown): Coordinate {
  const latDeg = toDegrees(lat);
  const lngDeg = toDegrees(lng);
  if (latDeg === null || lngDeg === null) {
    throw new InvalidCoordinateError(lat, lng);
  }
  return Object.freeze({ lat: latDeg, lng: lngDeg });
}

export function toPolygon(pairs: readonly (readonly unknown[])[]): Polygon {
  return pairs.map(([lat, lng]) => toCoordinate(lat, lng));
}

export function toPairs(polygon: Polygon): [number, number][] {
  return polygon.map(({ lat, lng }) => [lat, lng]);
}

/** Repeats the first vertex at the end unless the ring is already closed */
export function closeRing(polygon: Polygon): Polygon {
  if (polygon.length === 0) return polygon;
  const first = polygon[0];
  const last = polygon[polygon.length - 1];
  if (first.lat === last.lat && first.lng === last.lng) return polygon;
  return [...polygon, first];
}

// Ray-casting algorithm: returns true if point is inside polygon.
// Points exactly on an edge or vertex are classified by whichever side the ray test lands on.
export function insidePolygon(point: Coordinate, polygon: Polygon): boolean {
  if (polygon.length < 3) return false;

  const { lat, lng } = point;
  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const { lat: yi, lng: xi } = polygon[i];
    const { lat: yj, lng: xj } = polygon[j];
    const intersect = yi > lat !== yj > lat && lng < ((xj - xi) * (lat - yi)) / (yj - yi) + xi;
    if (intersect) inside = !inside;
  }
  return inside;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads the outer ring of the first feature of a GeoJSON FeatureCollection.
 * GeoJSON positions are [lng,lat]; the result is in lat/lng order.
 */
export function polygonFromGeoJson(body: unknown): Polygon {
  const invalid = () => AppError.badRequest("INVALID_GEOJSON", "Invalid GeoJSON FeatureCollection");

  if (!isRecord(body) || body.type !== "FeatureCollection") throw invalid();
  const features = body.features;
  if (!Array.isArray(features)) throw invalid();

  const feature: unknown = features[0];
  if (!isRecord(feature)) throw invalid();
  const geometry = feature.geometry;
  if (!isRecord(geometry)) throw invalid();

  const { type, coordinates } = geometry;
  if (type !== "Polygon" || !Array.isArray(coordinates) || !Array.isArray(coordinates[0])) {
    throw invalid();
  }

  const ring: unknown[] = coordinates[0];
  return ring.map((position) => {
    if (!Array.isArray(position) || position.length < 2) throw invalid();
    const [lng, lat] = position;
    return toCoordinate(lat, lng);
  });
}

export function encodeNeighborhood({ name, polygon }: Neighborhood): StoredNeighborhood {
  return { name, coordinates: toPairs(polygon) };
}

export function decodeNeighborhood(raw: unknown): Neighborhood {
  if (typeof raw !== "object" || raw === null || !("name" in raw) || !("coordinates" in raw)) {
    throw AppError.internal("Stored neighborhood is malformed", "STORE_CORRUPT");
  }
  const { name, coordinates } = raw;
  if (typeof name !== "string" || !Array.isArray(coordinates) || !coordinates.every(Array.isArray)) {
    throw AppError.internal("Stored neighborhood is malformed", "STORE_CORRUPT");
  }
  return { name, polygon: toPolygon(coordinates) };
}
