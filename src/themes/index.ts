import { DEFAULT_THEME_ID } from "../config";
import { createLogger } from "../log";
import themeData from "./themes.json";

const log = createLogger("themes");

export const THEME_COLOR_KEYS = [
  "bg",
  "text",
  "gradient_color",
  "water",
  "parks",
  "road_motorway",
  "road_primary",
  "road_secondary",
  "road_tertiary",
  "road_residential",
  "road_default"
] as const;

export type ThemeColorKey = (typeof THEME_COLOR_KEYS)[number];

export type PosterTheme = {
  name: string;
  description?: string;
} & Record<ThemeColorKey, string>;

export interface ThemeEntry {
  id: string;
  theme: PosterTheme;
}

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

export const FALLBACK_THEME: PosterTheme = {
  name: "Terracotta",
  description: "Mediterranean warmth - burnt orange and clay tones on cream",
  bg: "#F5EDE4",
  text: "#8B4513",
  gradient_color: "#F5EDE4",
  water: "#A8C4C4",
  parks: "#E8E0D0",
  road_motorway: "#A0522D",
  road_primary: "#B8653A",
  road_secondary: "#C9846A",
  road_tertiary: "#D9A08A",
  road_residential: "#E5C4B0",
  road_default: "#D9A08A"
};

export function isPosterTheme(value: unknown): value is PosterTheme {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  if (typeof record.name !== "string") {
    return false;
  }
  if (record.description !== undefined && typeof record.description !== "string") {
    return false;
  }
  return THEME_COLOR_KEYS.every((key) => {
    const color = record[key];
    return typeof color === "string" && HEX_COLOR.test(color);
  });
}

/** Validates a `{ id: theme }` map, dropping entries that are not complete themes. */
export function readThemeCatalog(source: unknown): ThemeEntry[] {
  if (typeof source !== "object" || source === null) {
    return [];
  }
  const entries: ThemeEntry[] = [];
  for (const [id, theme] of Object.entries(source)) {
    if (isPosterTheme(theme)) {
      entries.push({ id, theme });
    } else {
      log.warn(`Theme "${id}" is missing colours and was skipped.`);
    }
  }
  return entries.sort((a, b) => a.id.localeCompare(b.id));
}

const catalog = readThemeCatalog(themeData);

export function listThemes(): ThemeEntry[] {
  return catalog.slice();
}

export function loadTheme(id: string, themes: ThemeEntry[] = catalog): PosterTheme {
  const entry = themes.find((candidate) => candidate.id === id);
  if (entry) {
    return entry.theme;
  }
  log.warn(`Theme "${id}" not found. Using default ${DEFAULT_THEME_ID} theme.`);
  return FALLBACK_THEME;
}
