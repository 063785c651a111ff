import { DEFAULT_GOOGLE_FONTS_CSS_URL } from "../config";
import { NetworkError, isAbortError } from "../errors";
import { createLogger } from "../log";
import { safeReadText, snippet } from "../net/http";

const log = createLogger("fonts");

export type FontWeightName = "light" | "regular" | "bold";

export type FontWeights = Record<FontWeightName, number>;

export const REQUESTED_WEIGHTS: FontWeights = {
  light: 300,
  regular: 400,
  bold: 700
};

export interface FontFaceSource {
  weight: number;
  style: string;
  url: string;
  format: "woff2" | "woff" | "truetype" | "opentype";
  unicodeRange?: string;
}

export interface FontFaceLike {
  load(): Promise<unknown>;
}

export interface FontRegistry {
  add(face: FontFaceLike): unknown;
}

export type FontFaceFactory = (
  family: string,
  source: string,
  descriptors: { weight: string; style: string; unicodeRange?: string }
) => FontFaceLike;

export interface LoadGoogleFontOptions {
  cssUrl?: string;
  weights?: number[];
  signal?: AbortSignal;
  registry?: FontRegistry;
  createFace?: FontFaceFactory;
}

export interface LoadedFontFamily {
  family: string;
  weights: FontWeights;
  faceCount: number;
}

const FORMAT_BY_EXTENSION: Record<string, FontFaceSource["format"]> = {
  woff2: "woff2",
  woff: "woff",
  ttf: "truetype",
  otf: "opentype"
};

export function buildGoogleFontsCssUrl(
  family: string,
  weights: number[],
  baseUrl = DEFAULT_GOOGLE_FONTS_CSS_URL
): string {
  const familyParam = encodeURIComponent(family.trim()).replace(/%20/g, "+");
  const sorted = [...new Set(weights)].sort((a, b) => a - b);
  return `${baseUrl}?family=${familyParam}:wght@${sorted.join(";")}&display=swap`;
}

/** Reads the `@font-face` blocks of a Google Fonts stylesheet. */
export function parseFontFaceCss(css: string): FontFaceSource[] {
  const faces: FontFaceSource[] = [];
  const blocks = css.split(/@font-face\s*\{/).slice(1);
  for (const block of blocks) {
    const body = block.slice(0, block.indexOf("}") >= 0 ? block.indexOf("}") : block.length);
    const weightMatch = body.match(/font-weight:\s*(\d+)/);
    const urlMatch = body.match(/url\(\s*['"]?(https:\/\/[^)'"\s]+\.(woff2|woff|ttf|otf))['"]?\s*\)/);
    if (!weightMatch || !urlMatch) {
      continue;
    }
    const styleMatch = body.match(/font-style:\s*([a-z]+)/i);
    const rangeMatch = body.match(/unicode-range:\s*([^;]+);/);
    faces.push({
      weight: Number.parseInt(weightMatch[1], 10),
      style: styleMatch ? styleMatch[1].toLowerCase() : "normal",
      url: urlMatch[1],
      format: FORMAT_BY_EXTENSION[urlMatch[2]],
      unicodeRange: rangeMatch ? rangeMatch[1].trim() : undefined
    });
  }
  return faces;
}

/**
 * Maps light/regular/bold onto the weights the stylesheet actually offers,
 * taking the closest one (the lighter on a tie) when a weight is missing.
 */
export function resolveFontWeights(available: number[]): FontWeights | null {
  const weights = [...new Set(available)].sort((a, b) => a - b);
  if (weights.length === 0) {
    return null;
  }
  const closest = (target: number) =>
    weights.reduce((best, weight) => (Math.abs(weight - target) < Math.abs(best - target) ? weight : best));
  return {
    light: closest(REQUESTED_WEIGHTS.light),
    regular: closest(REQUESTED_WEIGHTS.regular),
    bold: closest(REQUESTED_WEIGHTS.bold)
  };
}

/** Downloads a family's stylesheet and registers every face with the document. */
export async function loadGoogleFontFamily(
  family: string,
  opts: LoadGoogleFontOptions = {}
): Promise<LoadedFontFamily> {
  const weights = opts.weights ?? Object.values(REQUESTED_WEIGHTS);
  const url = buildGoogleFontsCssUrl(family, weights, opts.cssUrl);
  log.debug(`Fetching ${url}`);

  let response: Response;
  try {
    response = await fetch(url, { signal: opts.signal });
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    throw new NetworkError(`Google Fonts unreachable while loading "${family}".`, 0);
  }
  if (!response.ok) {
    const detail = snippet(await safeReadText(response), 120);
    throw new NetworkError(
      `Google Fonts has no family "${family}" (${response.status}).${detail ? ` ${detail}` : ""}`,
      response.status
    );
  }

  const faces = parseFontFaceCss(await response.text());
  const resolved = resolveFontWeights(faces.map((face) => face.weight));
  if (!resolved) {
    throw new NetworkError(`Google Fonts returned no usable faces for "${family}".`, response.status);
  }

  const registry = opts.registry ?? document.fonts;
  const createFace = opts.createFace ?? createBrowserFontFace;
  for (const face of faces) {
    registry.add(
      createFace(family, `url(${face.url}) format("${face.format}")`, {
        weight: String(face.weight),
        style: face.style,
        unicodeRange: face.unicodeRange
      })
    );
  }
  log.info(`Registered ${faces.length} faces for ${family}`);
  return { family, weights: resolved, faceCount: faces.length };
}

function createBrowserFontFace(
  family: string,
  source: string,
  descriptors: { weight: string; style: string; unicodeRange?: string }
): FontFace {
  const { unicodeRange, ...rest } = descriptors;
  return new FontFace(family, source, unicodeRange ? { ...rest, unicodeRange } : rest);
}
