export interface GeoPoint {
  lat: number;
  lon: number;
}

export interface GeoBounds {
  north: number;
  south: number;
  east: number;
  west: number;
}

export interface ResolvedLocation extends GeoPoint {
  address?: string;
  source: "manual" | "geocoder" | "cache";
}

export interface PosterSize {
  widthIn: number;
  heightIn: number;
}

export interface PosterSettings extends PosterSize {
  city: string;
  country: string;
  displayCity?: string;
  displayCountry?: string;
  customText: string;
  customTextSize: number;
  showCoordinates: boolean;
  manualCoordinates: boolean;
  latitude: string;
  longitude: string;
  themeId: string;
  distanceM: number;
  cityScale: number;
  countryScale: number;
  lineScale: number;
  latinFontFamily?: string;
}
