import { Router } from "express";
import type { NextFunction, Request, Response, ErrorRequestHandler } from "express";

import { AppError } from "./errors.js";
import { polygonFromGeoJson, toCoordinate, toPairs } from "./geo.js";
import type { Commands } from "./commands.js";
import type { MatchMode } from "./types.js";

type Handler = (req: Request, res: Response) => unknown;

// Express 4 does not forward rejected promises, so route them to the error handler
const route =
  (handler: Handler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };

function parseMode(value: unknown): MatchMode | undefined {
  if (value === undefined) return undefined;
  if (value === "first" || value === "all") return value;
  throw AppError.badRequest("INVALID_MODE", `Invalid mode "${String(value)}", expected "first" or "all"`);
}

function parseSelectionParam(value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return value.join(",");
  if (typeof value === "string" || typeof value === "number") return String(value);
  throw AppError.badRequest("INVALID_SELECTION", "Selection must be \"all\" or a list of numbers");
}

export function createApi(commands: Commands): Router {
  const router = Router();

  // ---------- neighborhoods ----------
  router.get(
    "/neighborhoods",
    route((_req, res) => {
      res.json(commands.list().neighborhoods);
    })
  );

  router.post(
    "/neighborhoods",
    route((req, res) => {
      const { name } = req.body ?? {};
      let { coordinates } = req.body ?? {};

      // GeoJSON auto-detection
      if (!coordinates && req.body?.type === "FeatureCollection") {
        coordinates = toPairs(polygonFromGeoJson(req.body));
      }

      if (typeof name !== "string" || !Array.isArray(coordinates) || !coordinates.every(Array.isArray)) {
        throw AppError.badRequest("INVALID_PAYLOAD", "Invalid payload");
      }

      const { neighborhood } = commands.create({ command: "create", name, coordinates });
      res.status(201).json({ name: neighborhood.name, coordinates: toPairs(neighborhood.polygon) });
    })
  );

  router.delete(
    "/neighborhoods/:number",
    route((req, res) => {
      if (!/^\d+$/.test(req.params.number)) {
        throw AppError.badRequest("INVALID_NUMBER", "Invalid neighborhood number");
      }
      const number = parseInt(req.params.number, 10);
      res.json(commands.remove({ command: "delete", number }));
    })
  );

  // ---------- lookups ----------
  router.post(
    "/geocode",
    route(async (req, res) => {
      res.json(await commands.geocode({ command: "geocode", address: String(req.body?.address ?? "") }));
    })
  );

  router.post(
    "/check",
    route(async (req, res) => {
      const result = await commands.check({
        command: "check",
        address: String(req.body?.address ?? ""),
        selection: parseSelectionParam(req.body?.selection),
        mode: parseMode(req.body?.mode),
      });
      res.json(result);
    })
  );

  router.post(
    "/locate",
    route((req, res) => {
      const result = commands.locate({
        command: "locate",
        point: toCoordinate(req.body?.lat, req.body?.lng),
        selection: parseSelectionParam(req.body?.selection),
        mode: parseMode(req.body?.mode),
      });
      res.json(result);
    })
  );

  return router;
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof AppError) {
    res.status(err.statusCode).json(err.toJSON());
    return;
  }

  // body-parser tags its JSON parse failures
  if (err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed") {
    res.status(400).json({ error: "Malformed JSON body", code: "INVALID_PAYLOAD" });
    return;
  }

  console.error("Unexpected error:", err);
  res.status(500).json({ error: "Internal server error", code: "INTERNAL_ERROR" });
};
