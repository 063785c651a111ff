export interface AppConfig {
  nominatimUrl: string;
  overpassUrl: string;
  googleFontsCssUrl: string;
  cacheNamespace: string;
  debug: boolean;
}

export const DEFAULT_NOMINATIM_URL = "https://nominatim.openstreetmap.org/search";
export const DEFAULT_GOOGLE_FONTS_CSS_URL = "https://fonts.googleapis.com/css2";
export const DEFAULT_CACHE_NAMESPACE = "map-poster-cache-v1";

export const EXPORT_DPI = 300;
export const PREVIEW_DPI = 40;
export const POINTS_PER_INCH = 72;

export const DEFAULT_WIDTH_IN = 12;
export const DEFAULT_HEIGHT_IN = 16;
export const MAX_SIDE_IN = 20;

export const DISTANCE_MIN_M = 2000;
export const DISTANCE_MAX_M = 20000;
export const DISTANCE_DEFAULT_M = 10000;

export const DEFAULT_THEME_ID = "terracotta";
export const DEFAULT_CUSTOM_TEXT_SIZE = 18;

export const LATIN_FONT_FAMILY = "Roboto";
export const CJK_FONT_FAMILY = "Iansui";
export const GENERIC_FONT_FALLBACK = "sans-serif";

type EnvSource = Record<string, unknown>;

export function resolveConfig(env: EnvSource): AppConfig {
  return {
    nominatimUrl: readString(env, "VITE_NOMINATIM_URL") ?? DEFAULT_NOMINATIM_URL,
    overpassUrl: readString(env, "VITE_OVERPASS_URL") ?? "",
    googleFontsCssUrl: readString(env, "VITE_GOOGLE_FONTS_CSS_URL") ?? DEFAULT_GOOGLE_FONTS_CSS_URL,
    cacheNamespace: readString(env, "VITE_CACHE_NAMESPACE") ?? DEFAULT_CACHE_NAMESPACE,
    debug: readFlag(env, "VITE_DEBUG")
  };
}

function readString(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function readFlag(env: EnvSource, key: string): boolean {
  const value = env[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true";
}

export const appConfig: AppConfig = resolveConfig(import.meta.env);
