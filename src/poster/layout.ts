import { POINTS_PER_INCH } from "../config";
import type { FontWeightName } from "../fonts/googleFonts";

export interface TextBlockLayout {
  /** Baseline height as a fraction of the poster height, measured from the bottom. */
  y: number;
  sizePt: number;
  weight: FontWeightName;
  alpha: number;
}

export interface DividerLayout {
  y: number;
  x0: number;
  x1: number;
  widthPt: number;
}

export interface TextLayout {
  scaleFactor: number;
  city: TextBlockLayout;
  divider: DividerLayout;
  country: TextBlockLayout;
  coordinates: TextBlockLayout | null;
  caption: TextBlockLayout | null;
}

export interface TextLayoutOptions {
  widthIn: number;
  heightIn: number;
  cityScale: number;
  countryScale: number;
  customTextSize: number;
  showCoordinates: boolean;
  hasCaption: boolean;
}

const CITY_Y = 0.14;
const DIVIDER_Y = 0.125;
const COUNTRY_Y = 0.1;
const COORDINATES_Y = 0.07;
const CAPTION_Y_WITH_COORDINATES = 0.04;
const CAPTION_Y_WITHOUT_COORDINATES = 0.06;

const CITY_SIZE_PT = 60;
const COUNTRY_SIZE_PT = 22;
const COORDINATES_SIZE_PT = 14;

/** Text sizes were tuned on a 12 inch short side; other sizes scale from there. */
export function textScaleFactor(widthIn: number, heightIn: number): number {
  return Math.min(widthIn, heightIn) / 12;
}

export function computeTextLayout(opts: TextLayoutOptions): TextLayout {
  const scaleFactor = textScaleFactor(opts.widthIn, opts.heightIn);
  return {
    scaleFactor,
    city: { y: CITY_Y, sizePt: CITY_SIZE_PT * opts.cityScale * scaleFactor, weight: "bold", alpha: 1 },
    divider: { y: DIVIDER_Y, x0: 0.4, x1: 0.6, widthPt: scaleFactor },
    country: { y: COUNTRY_Y, sizePt: COUNTRY_SIZE_PT * opts.countryScale * scaleFactor, weight: "light", alpha: 1 },
    coordinates: opts.showCoordinates
      ? { y: COORDINATES_Y, sizePt: COORDINATES_SIZE_PT * scaleFactor, weight: "regular", alpha: 0.7 }
      : null,
    caption: opts.hasCaption
      ? {
          y: opts.showCoordinates ? CAPTION_Y_WITH_COORDINATES : CAPTION_Y_WITHOUT_COORDINATES,
          sizePt: opts.customTextSize * scaleFactor,
          weight: "light",
          alpha: 0.8
        }
      : null
  };
}

export function pointsToPixels(points: number, dpi: number): number {
  return (points * dpi) / POINTS_PER_INCH;
}

export function posterPixelSize(widthIn: number, heightIn: number, dpi: number): { width: number; height: number } {
  return {
    width: Math.max(1, Math.round(widthIn * dpi)),
    height: Math.max(1, Math.round(heightIn * dpi))
  };
}
