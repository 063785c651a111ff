import type { GeoPoint } from "../types";

export type RoadClass =
  | "motorway"
  | "trunk"
  | "primary"
  | "secondary"
  | "tertiary"
  | "residential"
  | "living_street"
  | "unclassified"
  | "service"
  | "track"
  | "path"
  | "footway"
  | "cycleway"
  | "pedestrian"
  | "other";

export type OverpassTags = Record<string, string>;

export interface OverpassNode {
  type: "node";
  id: number;
  lat: number;
  lon: number;
}

export interface OverpassWay {
  type: "way";
  id: number;
  nodes?: number[];
  geometry?: Array<GeoPoint | null>;
  tags?: OverpassTags;
}

export interface OverpassRelationMember {
  type: string;
  ref: number;
  role: string;
  geometry?: Array<GeoPoint | null>;
}

export interface OverpassRelation {
  type: "relation";
  id: number;
  members?: OverpassRelationMember[];
  tags?: OverpassTags;
}

export type OverpassElement = OverpassNode | OverpassWay | OverpassRelation;

export interface OverpassResponse {
  elements: unknown[];
  remark?: string;
}

export interface StreetNode extends GeoPoint {
  id: number;
}

/** Stretch of road between two graph nodes. */
export interface StreetEdge {
  id: string;
  wayId: number;
  from: number;
  to: number;
  highway: string;
  roadClass: RoadClass;
  name?: string;
  points: GeoPoint[];
}

export interface StreetGraph {
  nodes: StreetNode[];
  edges: StreetEdge[];
  intersectionCount: number;
}

export type AreaLayer = "water" | "parks";

/** Polygon made of an outer ring and optional holes, all closed. */
export interface AreaPolygon {
  id: string;
  outer: GeoPoint[];
  holes: GeoPoint[][];
}

export interface AreaFeatures {
  layer: AreaLayer;
  polygons: AreaPolygon[];
}
