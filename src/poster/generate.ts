import type { PosterCaches } from "../cache/posterCache";
import type { AppConfig } from "../config";
import { parseCoordinatePair } from "../coordinates";
import { geocodePlace } from "../geocode/nominatim";
import { compensatedDistance } from "../geo";
import { createLogger } from "../log";
import { fetchAreaFeatures } from "../osm/features";
import { fetchStreetNetwork } from "../osm/streetGraph";
import type { AreaFeatures, AreaLayer, StreetGraph } from "../osm/types";
import { loadTheme } from "../themes";
import type { GeoPoint, PosterSettings, ResolvedLocation } from "../types";
import type { GenerationPhase } from "../workflowState";
import { buildPosterLabels, buildPosterStyle, type PosterScene } from "./scene";

const log = createLogger("generate");

/** Network-facing steps of a run, injectable so tests can swap them out. */
export interface PosterServices {
  geocode(city: string, country: string, signal?: AbortSignal): Promise<ResolvedLocation>;
  fetchStreets(point: GeoPoint, distanceM: number, signal?: AbortSignal): Promise<StreetGraph>;
  fetchAreas(point: GeoPoint, distanceM: number, layer: AreaLayer, signal?: AbortSignal): Promise<AreaFeatures>;
}

export interface ServiceOptions {
  /** Ignore cached entries and overwrite them with fresh downloads. */
  refresh?: boolean;
}

export function createPosterServices(
  config: AppConfig,
  caches: PosterCaches,
  opts: ServiceOptions = {}
): PosterServices {
  const overpassEndpoint = config.overpassUrl || undefined;
  return {
    geocode: (city, country, signal) =>
      geocodePlace(city, country, {
        endpoint: config.nominatimUrl,
        cache: caches.coordinates,
        refresh: opts.refresh,
        signal
      }),
    fetchStreets: (point, distanceM, signal) =>
      fetchStreetNetwork(point, distanceM, {
        endpoint: overpassEndpoint,
        cache: caches.streetGraphs,
        refresh: opts.refresh,
        signal
      }),
    fetchAreas: (point, distanceM, layer, signal) =>
      fetchAreaFeatures(point, distanceM, layer, {
        endpoint: overpassEndpoint,
        cache: caches.areas,
        refresh: opts.refresh,
        signal
      })
  };
}

export interface GenerateOptions {
  signal?: AbortSignal;
  onPhase?: (phase: GenerationPhase, detail?: string) => void;
}

/** Manual coordinates bypass the geocoder entirely. */
export async function resolveLocation(
  settings: PosterSettings,
  services: PosterServices,
  signal?: AbortSignal
): Promise<ResolvedLocation> {
  if (settings.manualCoordinates) {
    const point = parseCoordinatePair(settings.latitude, settings.longitude);
    log.info(`Using manual coordinates ${point.lat}, ${point.lon}`);
    return { ...point, source: "manual" };
  }
  return services.geocode(settings.city, settings.country, signal);
}

/**
 * Resolves the location and downloads everything the poster draws. Streets are
 * required; water and parks degrade to empty layers inside their fetchers.
 */
export async function generatePoster(
  settings: PosterSettings,
  services: PosterServices,
  opts: GenerateOptions = {}
): Promise<PosterScene> {
  const { signal, onPhase } = opts;
  onPhase?.("geocoding", settings.manualCoordinates ? "manual coordinates" : settings.city);
  const location = await resolveLocation(settings, services, signal);
  signal?.throwIfAborted();

  const fetchDistanceM = compensatedDistance(settings.distanceM, settings.widthIn, settings.heightIn);
  onPhase?.("fetching", `${Math.round(fetchDistanceM)} m`);
  const graph = await services.fetchStreets(location, fetchDistanceM, signal);
  const water = await services.fetchAreas(location, fetchDistanceM, "water", signal);
  const parks = await services.fetchAreas(location, fetchDistanceM, "parks", signal);
  signal?.throwIfAborted();

  return {
    place: settings.city.trim(),
    location,
    fetchDistanceM,
    graph,
    water,
    parks,
    themeId: settings.themeId,
    theme: loadTheme(settings.themeId),
    labels: buildPosterLabels(settings, location),
    style: buildPosterStyle(settings)
  };
}
