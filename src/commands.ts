import { AppError } from "./errors.js";
import { closeRing, toPolygon } from "./geo.js";
import { withCountry } from "./geocoder.js";
import { resolve } from "./resolver.js";
import { parseSelection } from "./utils/parseSelection.js";
import type { Geocoder } from "./geocoder.js";
import type { NeighborhoodStore } from "./store.js";
import type { GeocodingConfig } from "./config.js";
import type { Coordinate, MatchMode, Neighborhood } from "./types.js";

export const MIN_VERTICES = 3;
export const MIN_ADDRESS_LENGTH = 3;

// ---------- requests ----------
export interface CreateRequest {
  command: "create";
  name: string;
  coordinates: readonly (readonly unknown[])[];
}

export interface ListRequest {
  command: "list";
}

export interface DeleteRequest {
  command: "delete";
  number: number;
}

export interface GeocodeRequest {
  command: "geocode";
  address: string;
}

export interface LocateRequest {
  command: "locate";
  point: Coordinate;
  selection?: string;
  mode?: MatchMode;
}

export interface CheckRequest {
  command: "check";
  address: string;
  selection?: string;
  mode?: MatchMode;
}

export type CommandRequest =
  | CreateRequest
  | ListRequest
  | DeleteRequest
  | GeocodeRequest
  | LocateRequest
  | CheckRequest;

// ---------- responses ----------
export interface CreateResponse {
  neighborhood: Neighborhood;
}

export interface ListEntry {
  number: number;
  name: string;
  vertexCount: number;
}

export interface ListResponse {
  neighborhoods: ListEntry[];
}

export interface DeleteResponse {
  deleted: string;
}

export interface GeocodeResponse {
  address: string;
  formattedAddress: string;
  coordinate: Coordinate;
}

export interface LocateResponse {
  point: Coordinate;
  mode: MatchMode;
  matches: string[];
}

export interface CheckResponse extends GeocodeResponse {
  mode: MatchMode;
  matches: string[];
}

export type CommandResponse =
  | CreateResponse
  | ListResponse
  | DeleteResponse
  | GeocodeResponse
  | LocateResponse
  | CheckResponse;

export interface CommandDeps {
  store: NeighborhoodStore;
  geocoder: Geocoder;
  geocoding: Pick<GeocodingConfig, "region" | "language" | "country" | "countryAliases">;
}

export function createCommands({ store, geocoder, geocoding }: CommandDeps) {
  function create({ name, coordinates }: CreateRequest): CreateResponse {
    const trimmed = typeof name === "string" ? name.trim() : "";
    if (!trimmed) {
      throw AppError.badRequest("INVALID_NAME", "Neighborhood name is required");
    }
    if (coordinates.length < MIN_VERTICES) {
      throw AppError.badRequest("TOO_FEW_POINTS", `A neighborhood needs at least ${MIN_VERTICES} points`, {
        received: coordinates.length,
      });
    }

    const neighborhood: Neighborhood = { name: trimmed, polygon: closeRing(toPolygon(coordinates)) };
    store.save([...store.load(), neighborhood]);
    console.log(`Neighborhood "${trimmed}" saved with ${neighborhood.polygon.length} vertices`);
    return { neighborhood };
  }

  function list(): ListResponse {
    return {
      neighborhoods: store.load().map(({ name, polygon }, i) => ({
        number: i + 1,
        name,
        vertexCount: polygon.length,
      })),
    };
  }

  function remove({ number }: DeleteRequest): DeleteResponse {
    const neighborhoods = store.load();
    if (!Number.isInteger(number) || number < 1 || number > neighborhoods.length) {
      throw AppError.notFound(`Neighborhood #${number}`);
    }

    const [deleted] = neighborhoods.splice(number - 1, 1);
    store.save(neighborhoods);
    console.log(`Neighborhood "${deleted.name}" deleted`);
    return { deleted: deleted.name };
  }

  async function geocode({ address }: GeocodeRequest): Promise<GeocodeResponse> {
    const trimmed = typeof address === "string" ? address.trim() : "";
    if (trimmed.length < MIN_ADDRESS_LENGTH) {
      throw AppError.badRequest("ADDRESS_TOO_SHORT", "Address too short");
    }

    const query = withCountry(trimmed, geocoding.country, geocoding.countryAliases);
    const result = await geocoder.geocode(query, { region: geocoding.region, language: geocoding.language });
    if (!result) throw AppError.notFound("Address");

    return { address: query, formattedAddress: result.formattedAddress, coordinate: result.coordinate };
  }

  function locate({ point, selection = "all", mode = "all" }: LocateRequest): LocateResponse {
    const neighborhoods = store.load();
    const selected = parseSelection(selection, neighborhoods.length).map((i) => neighborhoods[i]);
    const result = resolve(point, selected, mode);
    const matches = Array.isArray(result) ? result : result === null ? [] : [result];
    return { point, mode, matches };
  }

  async function check({ address, selection, mode }: CheckRequest): Promise<CheckResponse> {
    const found = await geocode({ command: "geocode", address });
    const { matches, mode: appliedMode } = locate({ command: "locate", point: found.coordinate, selection, mode });
    return { ...found, mode: appliedMode, matches };
  }

  /** Single entry point over every command */
  async function run(request: CommandRequest): Promise<CommandResponse> {
    switch (request.command) {
      case "create":
        return create(request);
      case "list":
        return list();
      case "delete":
        return remove(request);
      case "geocode":
        return geocode(request);
      case "locate":
        return locate(request);
      case "check":
        return check(request);
    }
  }

  return { create, list, remove, geocode, locate, check, run };
}

export type Commands = ReturnType<typeof createCommands>;
