import type { KeyValueCache } from "../cache/keyValueCache";
import { CacheError, isAbortError } from "../errors";
import { boundsAroundPoint } from "../geo";
import { createLogger } from "../log";
import type { GeoPoint } from "../types";
import { readRelation, readWay } from "./elements";
import { buildAreaQuery, runOverpassQuery, type OverpassRequestOptions } from "./overpass";
import { isGeoPoint } from "./streetGraph";
import type { AreaFeatures, AreaLayer, AreaPolygon, OverpassResponse } from "./types";

const log = createLogger("features");

export const AREA_LAYER_TAGS: Record<AreaLayer, Record<string, string[]>> = {
  water: {
    natural: ["water", "bay", "strait"],
    waterway: ["riverbank"]
  },
  parks: {
    leisure: ["park"],
    landuse: ["grass"]
  }
};

export interface FetchAreaFeaturesOptions extends OverpassRequestOptions {
  cache?: KeyValueCache<AreaFeatures>;
  refresh?: boolean;
}

export function areaFeaturesCacheKey(layer: AreaLayer, point: GeoPoint, distanceM: number): string {
  const tagKeys = Object.keys(AREA_LAYER_TAGS[layer]).join("_");
  return `${layer}_${point.lat.toFixed(5)}_${point.lon.toFixed(5)}_${Math.round(distanceM)}_${tagKeys}`;
}

/**
 * Water or park polygons around the point. A failed download leaves the layer
 * empty instead of failing the poster.
 */
export async function fetchAreaFeatures(
  point: GeoPoint,
  distanceM: number,
  layer: AreaLayer,
  opts: FetchAreaFeaturesOptions = {}
): Promise<AreaFeatures> {
  const key = areaFeaturesCacheKey(layer, point, distanceM);
  if (opts.cache && !opts.refresh) {
    try {
      const cached = await opts.cache.get(key);
      if (cached) {
        log.info(`Using cached ${layer}`);
        return cached;
      }
    } catch (error) {
      if (!(error instanceof CacheError)) {
        throw error;
      }
      log.warn(error.message);
    }
  }

  let features: AreaFeatures;
  try {
    const query = buildAreaQuery(boundsAroundPoint(point, distanceM), AREA_LAYER_TAGS[layer]);
    const { payload } = await runOverpassQuery(query, opts);
    features = { layer, polygons: parseAreaPolygons(payload) };
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    log.warn(`Could not download ${layer}, drawing without it:`, error instanceof Error ? error.message : error);
    return { layer, polygons: [] };
  }
  log.info(`${layer}: ${features.polygons.length} polygons`);

  if (opts.cache) {
    try {
      await opts.cache.set(key, features);
    } catch (error) {
      if (!(error instanceof CacheError)) {
        throw error;
      }
      log.warn(error.message);
    }
  }
  return features;
}

/** Closed ways and multipolygon relations from an Overpass `out geom` payload. */
export function parseAreaPolygons(payload: OverpassResponse): AreaPolygon[] {
  const polygons: AreaPolygon[] = [];
  for (const element of payload.elements) {
    const way = readWay(element);
    if (way) {
      const ring = compactPoints(way.geometry ?? []);
      if (isClosedRing(ring)) {
        polygons.push({ id: `way:${way.id}`, outer: ring, holes: [] });
      }
      continue;
    }
    const relation = readRelation(element);
    if (!relation) {
      continue;
    }
    const outerSegments: GeoPoint[][] = [];
    const innerSegments: GeoPoint[][] = [];
    for (const member of relation.members ?? []) {
      if (member.type !== "way" || !member.geometry) {
        continue;
      }
      const target = member.role === "inner" ? innerSegments : outerSegments;
      target.push(...splitAtGaps(member.geometry));
    }
    const outers = assembleRings(outerSegments);
    const inners = assembleRings(innerSegments);
    outers.forEach((outer, index) => {
      const holes = inners.filter((inner) => pointInRing(inner[0], outer));
      polygons.push({ id: `relation:${relation.id}:${index}`, outer, holes });
    });
  }
  return polygons;
}

/** Joins way segments end to end into closed rings; segments that never close are dropped. */
export function assembleRings(segments: GeoPoint[][]): GeoPoint[][] {
  const pending = segments.filter((segment) => segment.length >= 2).map((segment) => [...segment]);
  const rings: GeoPoint[][] = [];
  while (pending.length > 0) {
    const first = pending.shift();
    if (!first) {
      break;
    }
    let ring = first;
    while (!isClosedRing(ring)) {
      const end = ring[ring.length - 1];
      const index = pending.findIndex(
        (segment) => samePoint(segment[0], end) || samePoint(segment[segment.length - 1], end)
      );
      if (index < 0) {
        break;
      }
      const [next] = pending.splice(index, 1);
      const oriented = samePoint(next[0], end) ? next : [...next].reverse();
      ring = ring.concat(oriented.slice(1));
    }
    if (isClosedRing(ring)) {
      rings.push(ring);
    } else {
      log.debug("Dropping open ring with", ring.length, "points");
    }
  }
  return rings;
}

export function pointInRing(point: GeoPoint, ring: GeoPoint[]): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i, i += 1) {
    const a = ring[i];
    const b = ring[j];
    const crosses = a.lat > point.lat !== b.lat > point.lat;
    if (crosses && point.lon < ((b.lon - a.lon) * (point.lat - a.lat)) / (b.lat - a.lat) + a.lon) {
      inside = !inside;
    }
  }
  return inside;
}

function isClosedRing(points: GeoPoint[]): boolean {
  return points.length >= 4 && samePoint(points[0], points[points.length - 1]);
}

function samePoint(a: GeoPoint, b: GeoPoint): boolean {
  return a.lat === b.lat && a.lon === b.lon;
}

function compactPoints(points: Array<GeoPoint | null>): GeoPoint[] {
  return points.filter((point): point is GeoPoint => point !== null);
}

function splitAtGaps(points: Array<GeoPoint | null>): GeoPoint[][] {
  const parts: GeoPoint[][] = [];
  let current: GeoPoint[] = [];
  for (const point of points) {
    if (point) {
      current.push(point);
    } else if (current.length > 0) {
      parts.push(current);
      current = [];
    }
  }
  if (current.length > 0) {
    parts.push(current);
  }
  return parts;
}

export function isAreaFeatures(value: unknown): value is AreaFeatures {
  if (typeof value !== "object" || value === null || !("layer" in value) || !("polygons" in value)) {
    return false;
  }
  const { layer, polygons } = value;
  return (layer === "water" || layer === "parks") && Array.isArray(polygons) && polygons.every(isAreaPolygon);
}

function isAreaPolygon(value: unknown): boolean {
  if (typeof value !== "object" || value === null || !("outer" in value) || !("holes" in value)) {
    return false;
  }
  const { outer, holes } = value;
  return (
    Array.isArray(outer) &&
    outer.every(isGeoPoint) &&
    Array.isArray(holes) &&
    holes.every((hole) => Array.isArray(hole) && hole.every(isGeoPoint))
  );
}
