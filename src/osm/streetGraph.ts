import type { KeyValueCache } from "../cache/keyValueCache";
import { CacheError, PosterError } from "../errors";
import { boundsAroundPoint } from "../geo";
import { createLogger } from "../log";
import type { GeoPoint } from "../types";
import { readNode, readWay } from "./elements";
import { buildStreetNetworkQuery, runOverpassQuery, type OverpassRequestOptions } from "./overpass";
import type { OverpassResponse, RoadClass, StreetEdge, StreetGraph, StreetNode } from "./types";

const log = createLogger("streets");

export interface FetchStreetNetworkOptions extends OverpassRequestOptions {
  cache?: KeyValueCache<StreetGraph>;
  refresh?: boolean;
}

export function streetGraphCacheKey(point: GeoPoint, distanceM: number): string {
  return `graph_${point.lat.toFixed(5)}_${point.lon.toFixed(5)}_${Math.round(distanceM)}`;
}

/** Street network within `distanceM` metres (bbox) of the point, served from cache when possible. */
export async function fetchStreetNetwork(
  point: GeoPoint,
  distanceM: number,
  opts: FetchStreetNetworkOptions = {}
): Promise<StreetGraph> {
  const key = streetGraphCacheKey(point, distanceM);
  if (opts.cache && !opts.refresh) {
    try {
      const cached = await opts.cache.get(key);
      if (cached) {
        log.info("Using cached street network", key);
        return cached;
      }
    } catch (error) {
      if (!(error instanceof CacheError)) {
        throw error;
      }
      log.warn(error.message);
    }
  }

  const bounds = boundsAroundPoint(point, distanceM);
  log.info(`Downloading street network (${Math.round(distanceM)} m around ${point.lat}, ${point.lon})`);
  const { payload, endpoint } = await runOverpassQuery(buildStreetNetworkQuery(bounds), opts);
  const graph = parseStreetGraph(payload);
  if (graph.edges.length === 0) {
    throw new PosterError("network", "No streets found around this location. Check the place name or coordinates.");
  }
  log.info(
    `Street network from ${endpoint}: ${graph.nodes.length} nodes, ${graph.edges.length} edges, ` +
      `${graph.intersectionCount} intersections`
  );

  if (opts.cache) {
    try {
      await opts.cache.set(key, graph);
    } catch (error) {
      if (!(error instanceof CacheError)) {
        throw error;
      }
      log.warn(error.message);
    }
  }
  return graph;
}

/**
 * Builds the street graph from an Overpass `out body` payload. Way ends and
 * nodes where three or more road stretches meet become graph nodes; every way
 * is split into edges between consecutive graph nodes.
 */
export function parseStreetGraph(payload: OverpassResponse): StreetGraph {
  const coordinates = new Map<number, GeoPoint>();
  const ways: Array<{ id: number; nodeIds: number[]; highway: string; name?: string }> = [];

  for (const element of payload.elements) {
    const node = readNode(element);
    if (node) {
      coordinates.set(node.id, { lat: node.lat, lon: node.lon });
      continue;
    }
    const way = readWay(element);
    if (!way || !way.nodes || way.nodes.length < 2) {
      continue;
    }
    const highway = firstTagValue(way.tags?.highway);
    if (!highway) {
      continue;
    }
    ways.push({ id: way.id, nodeIds: way.nodes, highway, name: way.tags?.name ?? way.tags?.ref });
  }

  const degree = new Map<number, number>();
  for (const way of ways) {
    const last = way.nodeIds.length - 1;
    way.nodeIds.forEach((id, index) => {
      const increment = index === 0 || index === last ? 1 : 2;
      degree.set(id, (degree.get(id) ?? 0) + increment);
    });
  }

  const splitNodes = new Set<number>();
  for (const way of ways) {
    splitNodes.add(way.nodeIds[0]);
    splitNodes.add(way.nodeIds[way.nodeIds.length - 1]);
  }
  for (const [id, count] of degree) {
    if (count >= 3) {
      splitNodes.add(id);
    }
  }

  const edges: StreetEdge[] = [];
  const usedNodes = new Map<number, StreetNode>();
  for (const way of ways) {
    const points: GeoPoint[] = [];
    for (const id of way.nodeIds) {
      const point = coordinates.get(id);
      if (!point) {
        break;
      }
      points.push(point);
    }
    if (points.length !== way.nodeIds.length) {
      log.debug(`Skipping way ${way.id}: missing node coordinates`);
      continue;
    }

    const roadClass = mapRoadClass(way.highway);
    let startIndex = 0;
    let segment = 0;
    for (let i = 1; i < way.nodeIds.length; i += 1) {
      const id = way.nodeIds[i];
      if (!splitNodes.has(id) && i !== way.nodeIds.length - 1) {
        continue;
      }
      const from = way.nodeIds[startIndex];
      edges.push({
        id: `${way.id}:${segment}`,
        wayId: way.id,
        from,
        to: id,
        highway: way.highway,
        roadClass,
        name: way.name,
        points: points.slice(startIndex, i + 1)
      });
      usedNodes.set(from, { id: from, ...points[startIndex] });
      usedNodes.set(id, { id, ...points[i] });
      startIndex = i;
      segment += 1;
    }
  }

  let intersectionCount = 0;
  for (const id of usedNodes.keys()) {
    if ((degree.get(id) ?? 0) >= 3) {
      intersectionCount += 1;
    }
  }

  return {
    nodes: Array.from(usedNodes.values()),
    edges,
    intersectionCount
  };
}

export function mapRoadClass(highway: string): RoadClass {
  const normalized = highway.trim().toLowerCase();
  return ROAD_CLASS_MAP[normalized] ?? "other";
}

function firstTagValue(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const first = value.split(";")[0].trim();
  return first || undefined;
}

export function isStreetGraph(value: unknown): value is StreetGraph {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (!("nodes" in value) || !("edges" in value) || !("intersectionCount" in value)) {
    return false;
  }
  const { nodes, edges, intersectionCount } = value;
  return (
    typeof intersectionCount === "number" &&
    Array.isArray(nodes) &&
    Array.isArray(edges) &&
    nodes.every(isStreetNode) &&
    edges.every(isStreetEdge)
  );
}

function isStreetNode(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    "lat" in value &&
    "lon" in value &&
    typeof value.id === "number" &&
    typeof value.lat === "number" &&
    typeof value.lon === "number"
  );
}

function isStreetEdge(value: unknown): boolean {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (!("id" in value) || !("highway" in value) || !("roadClass" in value) || !("points" in value)) {
    return false;
  }
  return (
    typeof value.id === "string" &&
    typeof value.highway === "string" &&
    typeof value.roadClass === "string" &&
    Array.isArray(value.points) &&
    value.points.every(isGeoPoint)
  );
}

export function isGeoPoint(value: unknown): value is GeoPoint {
  return (
    typeof value === "object" &&
    value !== null &&
    "lat" in value &&
    "lon" in value &&
    typeof value.lat === "number" &&
    typeof value.lon === "number"
  );
}

const ROAD_CLASS_MAP: Record<string, RoadClass> = {
  motorway: "motorway",
  motorway_link: "motorway",
  trunk: "trunk",
  trunk_link: "trunk",
  primary: "primary",
  primary_link: "primary",
  secondary: "secondary",
  secondary_link: "secondary",
  tertiary: "tertiary",
  tertiary_link: "tertiary",
  residential: "residential",
  unclassified: "unclassified",
  living_street: "living_street",
  service: "service",
  track: "track",
  path: "path",
  footway: "footway",
  steps: "footway",
  pedestrian: "pedestrian",
  cycleway: "cycleway",
  bridleway: "path",
  corridor: "path"
};
