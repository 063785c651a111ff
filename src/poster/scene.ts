import { formatCoordinateLabel } from "../coordinates";
import { formatCityName } from "../fonts/scripts";
import type { AreaFeatures, StreetGraph } from "../osm/types";
import { loadTheme, type PosterTheme } from "../themes";
import type { GeoPoint, PosterSettings, ResolvedLocation } from "../types";

export interface PosterLabels {
  city: string;
  country: string;
  coordinates: string;
  caption: string | null;
}

export interface PosterStyle {
  widthIn: number;
  heightIn: number;
  cityScale: number;
  countryScale: number;
  lineScale: number;
  customTextSize: number;
  showCoordinates: boolean;
}

/** Everything the renderer needs; map data is fetched once and reused across themes. */
export interface PosterScene {
  /** City the map was fetched for; names exported files. */
  place: string;
  location: ResolvedLocation;
  fetchDistanceM: number;
  graph: StreetGraph;
  water: AreaFeatures;
  parks: AreaFeatures;
  themeId: string;
  theme: PosterTheme;
  labels: PosterLabels;
  style: PosterStyle;
}

export function buildPosterLabels(settings: PosterSettings, point: GeoPoint): PosterLabels {
  const city = settings.displayCity?.trim() || settings.city.trim();
  const country = settings.displayCountry?.trim() || settings.country.trim();
  const caption = settings.customText.trim();
  return {
    city: formatCityName(city),
    country: country.toUpperCase(),
    coordinates: formatCoordinateLabel(point),
    caption: caption ? caption : null
  };
}

export function buildPosterStyle(settings: PosterSettings): PosterStyle {
  return {
    widthIn: settings.widthIn,
    heightIn: settings.heightIn,
    cityScale: settings.cityScale,
    countryScale: settings.countryScale,
    lineScale: settings.lineScale,
    customTextSize: settings.customTextSize,
    showCoordinates: settings.showCoordinates
  };
}

export function withTheme(scene: PosterScene, themeId: string): PosterScene {
  return { ...scene, themeId, theme: loadTheme(themeId) };
}

/** Applies text and styling edits without refetching map data. */
export function withSettings(scene: PosterScene, settings: PosterSettings): PosterScene {
  return {
    ...scene,
    themeId: settings.themeId,
    theme: loadTheme(settings.themeId),
    labels: buildPosterLabels(settings, scene.location),
    style: buildPosterStyle(settings)
  };
}
