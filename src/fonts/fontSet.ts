import { CJK_FONT_FAMILY, GENERIC_FONT_FALLBACK, LATIN_FONT_FAMILY } from "../config";
import { describeError, isAbortError } from "../errors";
import { createLogger } from "../log";
import {
  loadGoogleFontFamily,
  REQUESTED_WEIGHTS,
  type FontWeightName,
  type FontWeights,
  type LoadGoogleFontOptions
} from "./googleFonts";
import { splitScriptRuns, type TextScript } from "./scripts";

const log = createLogger("fonts");

export interface FontChoice {
  family: string;
  weights: FontWeights;
}

/** One typeface for Latin runs and one for CJK runs. */
export interface FontSet {
  latin: FontChoice;
  cjk: FontChoice;
}

export const DEFAULT_FONT_SET: FontSet = {
  latin: { family: LATIN_FONT_FAMILY, weights: { ...REQUESTED_WEIGHTS } },
  cjk: { family: CJK_FONT_FAMILY, weights: { light: 400, regular: 400, bold: 400 } }
};

export interface FontLoadingOptions extends Omit<LoadGoogleFontOptions, "weights"> {
  latinFamily?: string;
}

/** CSS family list for a run: the script's own typeface first, the other one as backup. */
export function fontStack(script: TextScript, fonts: FontSet): string {
  const primary = script === "cjk" ? fonts.cjk : fonts.latin;
  const secondary = script === "cjk" ? fonts.latin : fonts.cjk;
  return `"${primary.family}", "${secondary.family}", ${GENERIC_FONT_FALLBACK}`;
}

export function cssFont(script: TextScript, weight: FontWeightName, sizePx: number, fonts: FontSet): string {
  const choice = script === "cjk" ? fonts.cjk : fonts.latin;
  return `${choice.weights[weight]} ${roundPx(sizePx)}px ${fontStack(script, fonts)}`;
}

/**
 * Registers the Latin typeface (Roboto unless overridden) and the CJK typeface.
 * A family that fails to load keeps its name so the browser can still use a
 * locally installed copy, then falls back to the generic family.
 */
export async function loadFontSet(opts: FontLoadingOptions = {}): Promise<FontSet> {
  const latinFamily = opts.latinFamily?.trim() || LATIN_FONT_FAMILY;
  const [latin, cjk] = await Promise.all([
    loadChoice(latinFamily, Object.values(REQUESTED_WEIGHTS), DEFAULT_FONT_SET.latin.weights, opts),
    loadChoice(CJK_FONT_FAMILY, [REQUESTED_WEIGHTS.regular], DEFAULT_FONT_SET.cjk.weights, opts)
  ]);
  return { latin, cjk };
}

async function loadChoice(
  family: string,
  weights: number[],
  fallbackWeights: FontWeights,
  opts: FontLoadingOptions
): Promise<FontChoice> {
  try {
    const loaded = await loadGoogleFontFamily(family, { ...opts, weights });
    return { family: loaded.family, weights: loaded.weights };
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    log.warn(`Failed to load "${family}", relying on installed fonts: ${describeError(error)}`);
    return { family, weights: { ...fallbackWeights } };
  }
}

export interface TextRequest {
  text: string;
  weight: FontWeightName;
}

type FontLoader = { load(font: string, text?: string): Promise<unknown> };

/** Waits until the faces covering every run of the given texts are downloaded. */
export async function ensureGlyphs(
  fonts: FontSet,
  requests: TextRequest[],
  loader: FontLoader = document.fonts
): Promise<void> {
  const pending: Array<Promise<unknown>> = [];
  for (const request of requests) {
    for (const run of splitScriptRuns(request.text)) {
      pending.push(loader.load(cssFont(run.script, request.weight, 16, fonts), run.text));
    }
  }
  const results = await Promise.allSettled(pending);
  const failed = results.filter((result) => result.status === "rejected").length;
  if (failed > 0) {
    log.warn(`${failed} font loads failed; text may render in a fallback face.`);
  }
}

function roundPx(value: number): number {
  return Math.round(value * 100) / 100;
}
