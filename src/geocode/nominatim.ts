import type { KeyValueCache } from "../cache/keyValueCache";
import { DEFAULT_NOMINATIM_URL } from "../config";
import { CacheError, GeocodingError, isAbortError } from "../errors";
import { createLogger } from "../log";
import { nominatimRateLimiter } from "../net/limiters";
import type { RateLimiter } from "../net/rateLimiter";
import type { ResolvedLocation } from "../types";

const log = createLogger("geocode");

export interface CachedCoordinates {
  lat: number;
  lon: number;
  address?: string;
}

/** Subset of a Nominatim `jsonv2` search hit. */
interface NominatimResult {
  lat: string;
  lon: string;
  display_name?: string;
}

export interface GeocodeOptions {
  endpoint?: string;
  cache?: KeyValueCache<CachedCoordinates>;
  limiter?: RateLimiter;
  signal?: AbortSignal;
  refresh?: boolean;
}

export function coordinatesCacheKey(city: string, country: string): string {
  return `coords_${city.trim().toLowerCase()}_${country.trim().toLowerCase()}`;
}

/**
 * Looks up `city, country`, answering from the coordinates cache when the place
 * was resolved before.
 */
export async function geocodePlace(
  city: string,
  country: string,
  opts: GeocodeOptions = {}
): Promise<ResolvedLocation> {
  const query = [city.trim(), country.trim()].filter((part) => part.length > 0).join(", ");
  if (!query) {
    throw new GeocodingError("not_found", query, "Enter a city (and country) to look up.");
  }

  const key = coordinatesCacheKey(city, country);
  if (opts.cache && !opts.refresh) {
    try {
      const cached = await opts.cache.get(key);
      if (cached) {
        log.info(`Using cached coordinates for ${query}`);
        return { ...cached, source: "cache" };
      }
    } catch (error) {
      if (!(error instanceof CacheError)) {
        throw error;
      }
      log.warn(error.message);
    }
  }

  log.info(`Looking up coordinates for ${query}`);
  const limiter = opts.limiter ?? nominatimRateLimiter;
  const hit = await limiter.schedule(
    () => searchNominatim(opts.endpoint ?? DEFAULT_NOMINATIM_URL, query, opts.signal),
    opts.signal
  );
  if (!hit) {
    throw new GeocodingError("not_found", query, `Could not find coordinates for ${query}.`);
  }
  log.info(`Found ${hit.address ?? query}: ${hit.lat}, ${hit.lon}`);

  if (opts.cache) {
    try {
      await opts.cache.set(key, hit);
    } catch (error) {
      if (!(error instanceof CacheError)) {
        throw error;
      }
      log.warn(error.message);
    }
  }
  return { ...hit, source: "geocoder" };
}

async function searchNominatim(
  endpoint: string,
  query: string,
  signal?: AbortSignal
): Promise<CachedCoordinates | null> {
  const url = new URL(endpoint);
  url.searchParams.set("q", query);
  url.searchParams.set("format", "jsonv2");
  url.searchParams.set("limit", "1");

  let response: Response;
  try {
    response = await fetch(url.toString(), {
      headers: { Accept: "application/json" },
      signal
    });
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    throw new GeocodingError("unavailable", query, `Geocoding failed for ${query}: geocoder unreachable.`, {
      cause: error
    });
  }
  if (!response.ok) {
    throw new GeocodingError(
      "unavailable",
      query,
      `Geocoding failed for ${query}: ${response.status} ${response.statusText}.`
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new GeocodingError("unavailable", query, `Geocoding failed for ${query}: invalid response.`, {
      cause: error
    });
  }
  if (!Array.isArray(body)) {
    throw new GeocodingError("unavailable", query, `Geocoding failed for ${query}: unexpected response.`);
  }
  const first: unknown = body[0];
  if (!isNominatimResult(first)) {
    return null;
  }
  const lat = Number.parseFloat(first.lat);
  const lon = Number.parseFloat(first.lon);
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    return null;
  }
  return { lat, lon, address: first.display_name };
}

function isNominatimResult(value: unknown): value is NominatimResult {
  if (typeof value !== "object" || value === null || !("lat" in value) || !("lon" in value)) {
    return false;
  }
  if ("display_name" in value && typeof value.display_name !== "string") {
    return false;
  }
  return typeof value.lat === "string" && typeof value.lon === "string";
}

export function isCachedCoordinates(value: unknown): value is CachedCoordinates {
  if (typeof value !== "object" || value === null || !("lat" in value) || !("lon" in value)) {
    return false;
  }
  if ("address" in value && value.address !== undefined && typeof value.address !== "string") {
    return false;
  }
  return (
    typeof value.lat === "number" &&
    Number.isFinite(value.lat) &&
    typeof value.lon === "number" &&
    Number.isFinite(value.lon)
  );
}
