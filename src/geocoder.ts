import { AppError, InvalidCoordinateError } from "./errors.js";
import { toCoordinate } from "./geo.js";
import type { Coordinate } from "./types.js";

export interface GeocodeHints {
  region?: string;
  language?: string;
}

export interface GeocodeResult {
  coordinate: Coordinate;
  formattedAddress: string;
}

/** Turns free text into a single coordinate; null when nothing matched */
export interface Geocoder {
  geocode(address: string, hints?: GeocodeHints): Promise<GeocodeResult | null>;
}

/**
 * Appends ", <country>" unless the address already names the country
 * (the exact name, or any alias compared case-insensitively).
 */
export function withCountry(address: string, country: string, aliases: readonly string[] = []): string {
  if (address.includes(country)) return address;
  const lower = address.toLowerCase();
  if (aliases.some((alias) => lower.includes(alias.toLowerCase()))) return address;
  return `${address}, ${country}`;
}

/** Subset of the Google Geocoding API response we read */
interface GoogleGeocodeResponse {
  status: string;
  error_message?: string;
  results: {
    formatted_address: string;
    geometry: { location: { lat: unknown; lng: unknown } };
  }[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readResult(raw: unknown): GoogleGeocodeResponse["results"][number] | null {
  if (!isRecord(raw)) return null;
  const formattedAddress = raw.formatted_address;
  const geometry = raw.geometry;
  if (typeof formattedAddress !== "string") return null;
  if (!isRecord(geometry)) return null;
  const location = geometry.location;
  if (!isRecord(location)) return null;
  return { formatted_address: formattedAddress, geometry: { location: { lat: location.lat, lng: location.lng } } };
}

// Null when the body doesn't look like a geocoding response
function readResponse(body: unknown): GoogleGeocodeResponse | null {
  if (!isRecord(body)) return null;
  const status = body.status;
  if (typeof status !== "string") return null;
  const rawResults = body.results ?? [];
  if (!Array.isArray(rawResults)) return null;

  const results: GoogleGeocodeResponse["results"] = [];
  for (const raw of rawResults) {
    const result = readResult(raw);
    if (!result) return null;
    results.push(result);
  }
  const errorMessage = typeof body.error_message === "string" ? body.error_message : undefined;
  return { status, error_message: errorMessage, results };
}

const GOOGLE_GEOCODE_URL = "https://maps.googleapis.com/maps/api/geocode/json";

export interface GoogleGeocoderOptions {
  apiKey: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class GoogleGeocoder implements Geocoder {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor({ apiKey, timeoutMs = 5000, fetchImpl = fetch }: GoogleGeocoderOptions) {
    this.apiKey = apiKey;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl;
  }

  async geocode(address: string, hints: GeocodeHints = {}): Promise<GeocodeResult | null> {
    if (!this.apiKey) {
      throw AppError.serviceUnavailable("Geocoding", { reason: "GOOGLE_MAPS_API_KEY is not set" });
    }

    const url = new URL(GOOGLE_GEOCODE_URL);
    url.searchParams.set("address", address);
    url.searchParams.set("key", this.apiKey);
    if (hints.region) url.searchParams.set("region", hints.region);
    if (hints.language) url.searchParams.set("language", hints.language);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    try {
      res = await this.fetchImpl(url, { signal: controller.signal });
    } catch (err) {
      console.warn(`Geocoding request for "${address}" failed:`, (err as Error).message);
      throw AppError.serviceUnavailable("Geocoding", { reason: (err as Error).message });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!res.ok) {
      console.warn(`Geocoding returned HTTP ${res.status} for "${address}"`);
      throw AppError.serviceUnavailable("Geocoding", { httpStatus: res.status });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      console.warn(`Geocoding returned a non-JSON body for "${address}":`, (err as Error).message);
      throw AppError.serviceUnavailable("Geocoding", { reason: "Response is not JSON" });
    }

    const data = readResponse(body);
    if (!data) {
      throw AppError.serviceUnavailable("Geocoding", { reason: "Unexpected response shape" });
    }

    if (data.status === "ZERO_RESULTS") return null;
    if (data.status !== "OK") {
      console.warn(`Geocoding status ${data.status} for "${address}":`, data.error_message ?? "");
      throw AppError.serviceUnavailable("Geocoding", { status: data.status, message: data.error_message });
    }

    const [first] = data.results;
    if (!first) return null;

    const { lat, lng } = first.geometry.location;
    let coordinate: Coordinate;
    try {
      coordinate = toCoordinate(lat, lng);
    } catch (err) {
      if (!(err instanceof InvalidCoordinateError)) throw err;
      throw AppError.serviceUnavailable("Geocoding", { reason: "Result has no usable location" });
    }
    return { coordinate, formattedAddress: first.formatted_address };
  }
}
