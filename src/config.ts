import dotenv from "dotenv";
import { AppError } from "./errors.js";

dotenv.config();

export type StorageDriver = "json" | "sqlite";

function parseStorage(value: string | undefined): StorageDriver {
  const driver = (value ?? "json").trim().toLowerCase();
  if (driver === "json" || driver === "sqlite") return driver;
  throw AppError.internal(`Unknown STORAGE driver "${value}"`, "INVALID_CONFIG");
}

export interface GeocodingConfig {
  region: string;
  language: string;
  // Appended to addresses that don't already name the country
  country: string;
  countryAliases: string[];
  timeoutMs: number;
}

export const config = {
  port: Number(process.env.PORT ?? 3000),
  storage: parseStorage(process.env.STORAGE),
  neighborhoodsFile: process.env.NEIGHBORHOODS_FILE || "neighborhoods.json",
  dbPath: process.env.DB_PATH || "data/neighborhoods.db",
  googleMapsApiKey: process.env.GOOGLE_MAPS_API_KEY ?? "",
  geocoding: {
    region: process.env.GEOCODE_REGION || "il",
    language: process.env.GEOCODE_LANGUAGE || "iw",
    country: process.env.GEOCODE_COUNTRY || "ישראל",
    countryAliases: (process.env.GEOCODE_COUNTRY_ALIASES || "israel")
      .split(",")
      .map((alias) => alias.trim())
      .filter(Boolean),
    timeoutMs: Number(process.env.GEOCODE_TIMEOUT_MS ?? 5000),
  } satisfies GeocodingConfig,
};

export type Config = typeof config;
