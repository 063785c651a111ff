import type { GeoPoint } from "../types";
import type {
  OverpassNode,
  OverpassRelation,
  OverpassRelationMember,
  OverpassTags,
  OverpassWay
} from "./types";

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readNode(value: unknown): OverpassNode | null {
  if (!isRecord(value) || value.type !== "node") {
    return null;
  }
  const { id, lat, lon } = value;
  if (typeof id !== "number" || typeof lat !== "number" || typeof lon !== "number") {
    return null;
  }
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    return null;
  }
  return { type: "node", id, lat, lon };
}

export function readWay(value: unknown): OverpassWay | null {
  if (!isRecord(value) || value.type !== "way" || typeof value.id !== "number") {
    return null;
  }
  const way: OverpassWay = { type: "way", id: value.id, tags: readTags(value.tags) };
  if (Array.isArray(value.nodes)) {
    way.nodes = value.nodes.filter((id): id is number => typeof id === "number");
  }
  if (Array.isArray(value.geometry)) {
    way.geometry = value.geometry.map(readPoint);
  }
  return way;
}

export function readRelation(value: unknown): OverpassRelation | null {
  if (!isRecord(value) || value.type !== "relation" || typeof value.id !== "number") {
    return null;
  }
  const members: OverpassRelationMember[] = [];
  if (Array.isArray(value.members)) {
    for (const raw of value.members) {
      if (!isRecord(raw) || typeof raw.type !== "string" || typeof raw.ref !== "number") {
        continue;
      }
      members.push({
        type: raw.type,
        ref: raw.ref,
        role: typeof raw.role === "string" ? raw.role : "",
        geometry: Array.isArray(raw.geometry) ? raw.geometry.map(readPoint) : undefined
      });
    }
  }
  return { type: "relation", id: value.id, members, tags: readTags(value.tags) };
}

function readTags(value: unknown): OverpassTags {
  const tags: OverpassTags = {};
  if (!isRecord(value)) {
    return tags;
  }
  for (const [key, tag] of Object.entries(value)) {
    if (typeof tag === "string") {
      tags[key] = tag;
    }
  }
  return tags;
}

// Overpass writes null for member vertices outside the query area.
function readPoint(value: unknown): GeoPoint | null {
  if (!isRecord(value)) {
    return null;
  }
  const { lat, lon } = value;
  if (typeof lat !== "number" || typeof lon !== "number" || !Number.isFinite(lat) || !Number.isFinite(lon)) {
    return null;
  }
  return { lat, lon };
}
