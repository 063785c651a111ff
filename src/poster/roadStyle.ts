import type { RoadClass, StreetEdge } from "../osm/types";
import type { PosterTheme, ThemeColorKey } from "../themes";

export interface RoadStroke {
  color: string;
  widthPt: number;
  /** Higher ranks draw later, on top of minor streets. */
  rank: number;
}

interface RoadTier {
  colorKey: ThemeColorKey;
  widthPt: number;
  rank: number;
}

const MOTORWAY: RoadTier = { colorKey: "road_motorway", widthPt: 1.2, rank: 5 };
const PRIMARY: RoadTier = { colorKey: "road_primary", widthPt: 1.0, rank: 4 };
const SECONDARY: RoadTier = { colorKey: "road_secondary", widthPt: 0.8, rank: 3 };
const TERTIARY: RoadTier = { colorKey: "road_tertiary", widthPt: 0.6, rank: 2 };
const RESIDENTIAL: RoadTier = { colorKey: "road_residential", widthPt: 0.4, rank: 1 };
const MINOR: RoadTier = { colorKey: "road_default", widthPt: 0.4, rank: 0 };

const ROAD_TIERS: Partial<Record<RoadClass, RoadTier>> = {
  motorway: MOTORWAY,
  trunk: PRIMARY,
  primary: PRIMARY,
  secondary: SECONDARY,
  tertiary: TERTIARY,
  residential: RESIDENTIAL,
  living_street: RESIDENTIAL,
  unclassified: RESIDENTIAL
};

export function roadStroke(roadClass: RoadClass, theme: PosterTheme, lineScale = 1): RoadStroke {
  const tier = ROAD_TIERS[roadClass] ?? MINOR;
  return {
    color: theme[tier.colorKey],
    widthPt: tier.widthPt * lineScale,
    rank: tier.rank
  };
}

/** Edges paired with their stroke, minor roads first. */
export function orderEdgesForDrawing(
  edges: StreetEdge[],
  theme: PosterTheme,
  lineScale = 1
): Array<{ edge: StreetEdge; stroke: RoadStroke }> {
  return edges
    .map((edge) => ({ edge, stroke: roadStroke(edge.roadClass, theme, lineScale) }))
    .sort((a, b) => a.stroke.rank - b.stroke.rank);
}
