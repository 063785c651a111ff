import type { GeoBounds, GeoPoint } from "./types";

// Mean earth radius, the value OpenStreetMap tooling uses for bbox maths.
export const EARTH_RADIUS_M = 6_371_009;

export interface PlanePoint {
  x: number;
  y: number;
}

export interface CropLimits {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export interface LocalProjector {
  readonly center: GeoPoint;
  project(point: GeoPoint): PlanePoint;
  unproject(point: PlanePoint): GeoPoint;
}

/** Square bounding box reaching `distanceM` metres from the point along each axis. */
export function boundsAroundPoint(point: GeoPoint, distanceM: number): GeoBounds {
  const deltaLat = toDegrees(distanceM / EARTH_RADIUS_M);
  const cosLat = Math.cos(toRadians(point.lat));
  const deltaLon = cosLat > 1e-9 ? deltaLat / cosLat : 180;
  return normalizeBounds({
    north: point.lat + deltaLat,
    south: point.lat - deltaLat,
    east: point.lon + deltaLon,
    west: point.lon - deltaLon
  });
}

/**
 * Equirectangular projection to metres around a centre point. Accurate enough for
 * the tens of kilometres a poster covers.
 */
export function createLocalProjector(center: GeoPoint): LocalProjector {
  const cosLat = Math.cos(toRadians(center.lat));
  return {
    center,
    project(point) {
      return {
        x: EARTH_RADIUS_M * toRadians(point.lon - center.lon) * cosLat,
        y: EARTH_RADIUS_M * toRadians(point.lat - center.lat)
      };
    },
    unproject(point) {
      return {
        lat: center.lat + toDegrees(point.y / EARTH_RADIUS_M),
        lon: center.lon + toDegrees(point.x / (EARTH_RADIUS_M * cosLat))
      };
    }
  };
}

/**
 * Radius to fetch so that, after cropping to the poster's aspect ratio, the map
 * still fills the sheet.
 */
export function compensatedDistance(distanceM: number, widthIn: number, heightIn: number): number {
  const longSide = Math.max(widthIn, heightIn);
  const shortSide = Math.min(widthIn, heightIn);
  if (!(shortSide > 0)) {
    return distanceM / 4;
  }
  return (distanceM * (longSide / shortSide)) / 4;
}

/** Crops inward from ±distance so the visible window matches `aspect` (width / height). */
export function cropLimits(distanceM: number, aspect: number): CropLimits {
  let halfX = distanceM;
  let halfY = distanceM;
  if (aspect > 1) {
    halfY = halfX / aspect;
  } else {
    halfX = halfY * aspect;
  }
  return { minX: -halfX, maxX: halfX, minY: -halfY, maxY: halfY };
}

/** Maps plane metres inside `limits` onto a canvas of the given size (y grows downward). */
export function createViewTransform(
  limits: CropLimits,
  widthPx: number,
  heightPx: number
): (point: PlanePoint) => PlanePoint {
  const spanX = limits.maxX - limits.minX;
  const spanY = limits.maxY - limits.minY;
  const scaleX = spanX === 0 ? 0 : widthPx / spanX;
  const scaleY = spanY === 0 ? 0 : heightPx / spanY;
  return (point) => ({
    x: (point.x - limits.minX) * scaleX,
    y: (limits.maxY - point.y) * scaleY
  });
}

export function normalizeBounds(bounds: GeoBounds): GeoBounds {
  return {
    north: clampLat(Math.max(bounds.north, bounds.south)),
    south: clampLat(Math.min(bounds.north, bounds.south)),
    east: clampLon(Math.max(bounds.east, bounds.west)),
    west: clampLon(Math.min(bounds.east, bounds.west))
  };
}

export function clampLat(value: number): number {
  return clamp(value, -90, 90);
}

export function clampLon(value: number): number {
  return clamp(value, -180, 180);
}

export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}
