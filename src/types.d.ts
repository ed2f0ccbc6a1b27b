/** A point in degrees. Values are not range-checked. */
export interface Coordinate {
  readonly lat: number;
  readonly lng: number;
}

/** Polygon boundary as an ordered vertex list; open or closed rings both work */
export type Polygon = readonly Coordinate[];

export interface Neighborhood {
  name: string;
  polygon: Polygon;
}

/** Ordered; earlier entries win first-match lookups */
export type NeighborhoodSet = readonly Neighborhood[];

export type MatchMode = "first" | "all";

/** Neighborhood as stored on disk, coordinates as [lat,lng] pairs */
export interface StoredNeighborhood {
  name: string;
  coordinates: [number, number][];
}
