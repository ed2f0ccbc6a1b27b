import { describe, expect, it } from "vitest";
import { AppError, InvalidCoordinateError } from "../errors.js";
import { closeRing, decodeNeighborhood, insidePolygon, polygonFromGeoJson, toCoordinate, toPolygon } from "../geo.js";
import { captureError } from "./fakes.js";

const pt = (lat: number, lng: number) => toCoordinate(lat, lng);

const square = toPolygon([
  [0, 0],
  [0, 10],
  [10, 10],
  [10, 0],
]);

const unitSquare = toPolygon([
  [0, 0],
  [0, 1],
  [1, 1],
  [1, 0],
]);

// U shape: notch between lng 1..2 opens upward from lat 1
const uShape = toPolygon([
  [0, 0],
  [0, 3],
  [3, 3],
  [3, 2],
  [1, 2],
  [1, 1],
  [3, 1],
  [3, 0],
]);

const florentin = toPolygon([
  [32.08, 34.78],
  [32.08, 34.785],
  [32.085, 34.785],
  [32.085, 34.78],
]);

describe("toCoordinate()", () => {
  it("accepts finite numbers and numeric strings", () => {
    expect(toCoordinate(32.08, 34.78)).toEqual({ lat: 32.08, lng: 34.78 });
    expect(toCoordinate(" 32.08", "34.78 ")).toEqual({ lat: 32.08, lng: 34.78 });
  });

  it("does not range-check degrees", () => {
    expect(toCoordinate(200, -500)).toEqual({ lat: 200, lng: -500 });
  });

  it("returns a frozen value", () => {
    expect(Object.isFrozen(toCoordinate(1, 2))).toBe(true);
  });

  it.each([
    [NaN, 1],
    [1, Infinity],
    ["", 1],
    ["abc", 1],
    [null, 1],
    [1, undefined],
    [{}, 1],
  ])("rejects %s,%s", (lat, lng) => {
    const err = captureError(() => toCoordinate(lat, lng));
    expect(err).toBeInstanceOf(InvalidCoordinateError);
    expect(err).toMatchObject({ kind: "InvalidCoordinate", statusCode: 400, code: "INVALID_COORDINATE" });
  });
});

describe("insidePolygon()", () => {
  it("returns true for point inside", () => {
    expect(insidePolygon(pt(5, 5), square)).toBe(true);
  });

  it("returns false for point outside", () => {
    expect(insidePolygon(pt(15, 5), square)).toBe(false);
  });

  it("contains the centroid of the unit square but not a far point", () => {
    expect(insidePolygon(pt(0.5, 0.5), unitSquare)).toBe(true);
    expect(insidePolygon(pt(10, 10), unitSquare)).toBe(false);
  });

  it("never contains anything with fewer than 3 vertices", () => {
    for (const polygon of [[], [pt(0, 0)], [pt(0, 0), pt(10, 10)]]) {
      expect(insidePolygon(pt(0, 0), polygon)).toBe(false);
      expect(insidePolygon(pt(5, 5), polygon)).toBe(false);
    }
  });

  it("handles a small square in Tel Aviv", () => {
    expect(insidePolygon(pt(32.082, 34.782), florentin)).toBe(true);
    expect(insidePolygon(pt(32.09, 34.782), florentin)).toBe(false);
  });

  describe("for a concave polygon", () => {
    it("excludes the notch", () => {
      expect(insidePolygon(pt(2, 1.5), uShape)).toBe(false);
    });
    it("includes the arms and the base", () => {
      expect(insidePolygon(pt(2, 0.5), uShape)).toBe(true);
      expect(insidePolygon(pt(0.5, 1.5), uShape)).toBe(true);
    });
  });

  describe("ring representation", () => {
    const probes = [pt(2, 1.5), pt(2, 0.5), pt(0.5, 1.5), pt(2, 2.5), pt(4, 1)];
    const expected = probes.map((p) => insidePolygon(p, uShape));

    it("is invariant to cyclic rotation", () => {
      for (let k = 1; k < uShape.length; k++) {
        const rotated = [...uShape.slice(k), ...uShape.slice(0, k)];
        expect(probes.map((p) => insidePolygon(p, rotated))).toEqual(expected);
      }
    });

    it("is invariant to winding direction", () => {
      const reversed = [...uShape].reverse();
      expect(probes.map((p) => insidePolygon(p, reversed))).toEqual(expected);
    });

    it("gives the same result for a closed ring", () => {
      expect(probes.map((p) => insidePolygon(p, closeRing(uShape)))).toEqual(expected);
    });
  });

  // Ray casting toward increasing longitude; boundary points are not special-cased
  describe("on the boundary", () => {
    it("counts the southern edge as inside", () => {
      expect(insidePolygon(pt(0, 5), square)).toBe(true);
    });
    it("counts the western edge as inside", () => {
      expect(insidePolygon(pt(5, 0), square)).toBe(true);
    });
    it("counts the south-west corner as inside", () => {
      expect(insidePolygon(pt(0, 0), square)).toBe(true);
    });
    it("counts the northern edge as outside", () => {
      expect(insidePolygon(pt(10, 5), square)).toBe(false);
    });
    it("counts the eastern edge as outside", () => {
      expect(insidePolygon(pt(5, 10), square)).toBe(false);
    });
  });
});

describe("closeRing()", () => {
  it("appends the first vertex to an open ring", () => {
    const closed = closeRing(square);
    expect(closed).toHaveLength(5);
    expect(closed[4]).toEqual({ lat: 0, lng: 0 });
  });

  it("leaves a closed ring alone", () => {
    const closed = closeRing(square);
    expect(closeRing(closed)).toBe(closed);
  });

  it("leaves an empty polygon alone", () => {
    expect(closeRing([])).toEqual([]);
  });
});

describe("polygonFromGeoJson()", () => {
  it("swaps GeoJSON [lng,lat] positions", () => {
    const polygon = polygonFromGeoJson({
      type: "FeatureCollection",
      features: [
        {
          type: "Feature",
          geometry: {
            type: "Polygon",
            coordinates: [
              [
                [34.78, 32.08],
                [34.785, 32.08],
                [34.785, 32.085],
              ],
            ],
          },
        },
      ],
    });
    expect(polygon).toEqual([
      { lat: 32.08, lng: 34.78 },
      { lat: 32.08, lng: 34.785 },
      { lat: 32.085, lng: 34.785 },
    ]);
  });

  it("rejects anything that is not a polygon feature collection", () => {
    const notPolygon = {
      type: "FeatureCollection",
      features: [{ type: "Feature", geometry: { type: "Point", coordinates: [34.78, 32.08] } }],
    };
    for (const body of [null, { type: "Feature" }, { type: "FeatureCollection", features: [] }, notPolygon]) {
      const err = captureError(() => polygonFromGeoJson(body));
      expect(err).toBeInstanceOf(AppError);
      expect(err).toMatchObject({ statusCode: 400, code: "INVALID_GEOJSON" });
    }
  });
});

describe("decodeNeighborhood()", () => {
  it("reads stored [lat,lng] pairs", () => {
    expect(decodeNeighborhood({ name: "Florentin", coordinates: [[32.08, 34.78]] })).toEqual({
      name: "Florentin",
      polygon: [{ lat: 32.08, lng: 34.78 }],
    });
  });

  it("rejects malformed records", () => {
    for (const raw of [null, { name: "x" }, { name: 1, coordinates: [] }, { name: "x", coordinates: [1, 2] }]) {
      expect(captureError(() => decodeNeighborhood(raw))).toMatchObject({ code: "STORE_CORRUPT" });
    }
  });
});
