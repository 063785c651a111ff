import {
  DEFAULT_CUSTOM_TEXT_SIZE,
  DEFAULT_HEIGHT_IN,
  DEFAULT_THEME_ID,
  DEFAULT_WIDTH_IN,
  DISTANCE_DEFAULT_M,
  DISTANCE_MAX_M,
  DISTANCE_MIN_M,
  MAX_SIDE_IN
} from "./config";
import { clamp } from "./geo";
import { createLogger } from "./log";
import type { PosterSettings } from "./types";

const log = createLogger("settings");

export const AUTOSAVE_KEY = "map-poster-settings-v1";

const SCALE_MIN = 0.1;
const SCALE_MAX = 5;

export function createDefaultSettings(): PosterSettings {
  return {
    city: "",
    country: "",
    customText: "",
    customTextSize: DEFAULT_CUSTOM_TEXT_SIZE,
    showCoordinates: true,
    manualCoordinates: false,
    latitude: "",
    longitude: "",
    themeId: DEFAULT_THEME_ID,
    distanceM: DISTANCE_DEFAULT_M,
    widthIn: DEFAULT_WIDTH_IN,
    heightIn: DEFAULT_HEIGHT_IN,
    cityScale: 1,
    countryScale: 1,
    lineScale: 1
  };
}

export interface SanitizedSettings {
  settings: PosterSettings;
  warnings: string[];
}

type StringKey = "city" | "country" | "customText" | "latitude" | "longitude" | "themeId";
type OptionalStringKey = "displayCity" | "displayCountry" | "latinFontFamily";
type BooleanKey = "showCoordinates" | "manualCoordinates";

const STRING_KEYS: StringKey[] = ["city", "country", "customText", "latitude", "longitude", "themeId"];
const OPTIONAL_STRING_KEYS: OptionalStringKey[] = ["displayCity", "displayCountry", "latinFontFamily"];
const BOOLEAN_KEYS: BooleanKey[] = ["showCoordinates", "manualCoordinates"];

/**
 * Builds settings from untrusted input (autosave or form). Invalid fields keep
 * their defaults; out-of-range numbers are clamped and reported.
 */
export function sanitizeSettings(raw: unknown): SanitizedSettings {
  const settings = createDefaultSettings();
  const warnings: string[] = [];
  if (typeof raw !== "object" || raw === null) {
    return { settings, warnings };
  }
  const source: Record<string, unknown> = { ...raw };

  for (const key of STRING_KEYS) {
    const value = source[key];
    if (typeof value === "string") {
      settings[key] = value;
    }
  }
  if (!settings.themeId.trim()) {
    settings.themeId = DEFAULT_THEME_ID;
  }
  for (const key of OPTIONAL_STRING_KEYS) {
    const value = source[key];
    if (typeof value === "string" && value.trim()) {
      settings[key] = value;
    }
  }
  for (const key of BOOLEAN_KEYS) {
    const value = source[key];
    if (typeof value === "boolean") {
      settings[key] = value;
    }
  }

  const distance = readNumber(source.distanceM);
  if (distance !== null) {
    settings.distanceM = clamp(distance, DISTANCE_MIN_M, DISTANCE_MAX_M);
    if (settings.distanceM !== distance) {
      warnings.push(`Distance ${distance} m is outside ${DISTANCE_MIN_M}-${DISTANCE_MAX_M} m; using ${settings.distanceM} m.`);
    }
  }

  settings.widthIn = readSide(source.widthIn, "Width", DEFAULT_WIDTH_IN, warnings);
  settings.heightIn = readSide(source.heightIn, "Height", DEFAULT_HEIGHT_IN, warnings);

  const textSize = readNumber(source.customTextSize);
  if (textSize !== null && textSize > 0) {
    settings.customTextSize = textSize;
  }
  settings.cityScale = readScale(source.cityScale);
  settings.countryScale = readScale(source.countryScale);
  settings.lineScale = readScale(source.lineScale);

  return { settings, warnings };
}

function readNumber(value: unknown): number | null {
  const parsed = typeof value === "string" && value.trim() ? Number(value) : value;
  return typeof parsed === "number" && Number.isFinite(parsed) ? parsed : null;
}

function readSide(value: unknown, label: string, fallback: number, warnings: string[]): number {
  const side = readNumber(value);
  if (side === null) {
    return fallback;
  }
  if (side <= 0) {
    warnings.push(`${label} must be positive; using ${fallback} in.`);
    return fallback;
  }
  if (side > MAX_SIDE_IN) {
    warnings.push(`${label} ${side} in exceeds the ${MAX_SIDE_IN} in maximum; using ${MAX_SIDE_IN} in.`);
    return MAX_SIDE_IN;
  }
  return side;
}

function readScale(value: unknown): number {
  const scale = readNumber(value);
  return scale === null ? 1 : clamp(scale, SCALE_MIN, SCALE_MAX);
}

type SettingsStorage = Pick<Storage, "getItem" | "setItem">;

export function loadAutosave(storage: SettingsStorage = window.localStorage): PosterSettings | null {
  const raw = storage.getItem(AUTOSAVE_KEY);
  if (!raw) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    log.warn("Ignoring unreadable autosave", error);
    return null;
  }
  const { settings, warnings } = sanitizeSettings(parsed);
  warnings.forEach((warning) => log.warn(warning));
  return settings;
}

export function saveAutosave(settings: PosterSettings, storage: SettingsStorage = window.localStorage): void {
  storage.setItem(AUTOSAVE_KEY, JSON.stringify(settings));
}
