import { CoordinateParseError } from "./errors";
import type { GeoPoint } from "./types";

export type CoordinateAxis = "latitude" | "longitude";

const AXIS_LIMIT: Record<CoordinateAxis, number> = {
  latitude: 90,
  longitude: 180
};

const AXIS_HEMISPHERES: Record<CoordinateAxis, { positive: string; negative: string }> = {
  latitude: { positive: "N", negative: "S" },
  longitude: { positive: "E", negative: "W" }
};

const LEADING_PART = /^[-+]?\d+(\.\d+)?$/;
const TRAILING_PART = /^\d+(\.\d+)?$/;

/**
 * Parses a manually typed latitude or longitude.
 *
 * Accepts decimal degrees (`-73.9713`), a hemisphere letter before or after the
 * value (`N 40.7766`, `73.9713W`) and degrees/minutes/seconds
 * (`40°46'36"N`, `40 46 36 N`).
 */
export function parseCoordinate(text: string, axis: CoordinateAxis): number {
  const label = axis === "latitude" ? "Latitude" : "Longitude";
  const input = text.trim();
  if (!input) {
    throw new CoordinateParseError(text, `${label} is required.`);
  }

  const hemispheres = AXIS_HEMISPHERES[axis];
  const letters = input.toUpperCase().match(/[A-Z]/g) ?? [];
  if (letters.length > 1) {
    throw new CoordinateParseError(text, `${label} "${input}" is not a coordinate.`);
  }
  const hemisphere = letters[0];
  if (hemisphere && hemisphere !== hemispheres.positive && hemisphere !== hemispheres.negative) {
    throw new CoordinateParseError(
      text,
      `${label} must use ${hemispheres.positive} or ${hemispheres.negative}, got "${hemisphere}".`
    );
  }

  const parts = input
    .replace(/[A-Za-z]/g, " ")
    .replace(/[°º'"′″:]/g, " ")
    .trim()
    .split(/\s+/)
    .filter((part) => part.length > 0);
  if (parts.length === 0 || parts.length > 3) {
    throw new CoordinateParseError(text, `${label} "${input}" is not a coordinate.`);
  }
  if (!LEADING_PART.test(parts[0]) || !parts.slice(1).every((part) => TRAILING_PART.test(part))) {
    throw new CoordinateParseError(text, `${label} "${input}" is not a coordinate.`);
  }

  const values = parts.map((part) => Number.parseFloat(part));
  const degrees = values[0];
  const minutes = values.length > 1 ? values[1] : 0;
  const seconds = values.length > 2 ? values[2] : 0;
  if (minutes >= 60 || seconds >= 60) {
    throw new CoordinateParseError(text, `${label} minutes and seconds must be below 60.`);
  }
  const negative = parts[0].startsWith("-") || hemisphere === hemispheres.negative;
  const magnitude = Math.abs(degrees) + minutes / 60 + seconds / 3600;
  const value = negative ? -magnitude : magnitude;

  const limit = AXIS_LIMIT[axis];
  if (Math.abs(value) > limit) {
    throw new CoordinateParseError(text, `${label} must be between -${limit} and ${limit}.`);
  }
  return value;
}

export function parseCoordinatePair(latitude: string, longitude: string): GeoPoint {
  return {
    lat: parseCoordinate(latitude, "latitude"),
    lon: parseCoordinate(longitude, "longitude")
  };
}

/** `40.7767° N / 73.9713° W` */
export function formatCoordinateLabel(point: GeoPoint): string {
  const latHemisphere = point.lat >= 0 ? "N" : "S";
  const lonHemisphere = point.lon >= 0 ? "E" : "W";
  return `${Math.abs(point.lat).toFixed(4)}° ${latHemisphere} / ${Math.abs(point.lon).toFixed(4)}° ${lonHemisphere}`;
}
