export type TextScript = "latin" | "cjk";

export interface ScriptRun {
  script: TextScript;
  text: string;
}

const LETTER = /\p{L}/u;

// Inclusive code point ranges rendered with the CJK typeface.
const CJK_RANGES: Array<[number, number]> = [
  [0x1100, 0x11ff], // Hangul Jamo
  [0x2e80, 0x2fdf], // CJK radicals, Kangxi radicals
  [0x3000, 0x303f], // CJK symbols and punctuation
  [0x3040, 0x30ff], // Hiragana, Katakana
  [0x3100, 0x312f], // Bopomofo
  [0x3130, 0x318f], // Hangul compatibility Jamo
  [0x31a0, 0x31ff], // Bopomofo extended, CJK strokes, Katakana extensions
  [0x3200, 0x4dbf], // Enclosed CJK, compatibility, Extension A
  [0x4e00, 0x9fff], // Unified ideographs
  [0xa960, 0xa97f], // Hangul Jamo extended-A
  [0xac00, 0xd7ff], // Hangul syllables, Jamo extended-B
  [0xf900, 0xfaff], // Compatibility ideographs
  [0xfe30, 0xfe4f], // CJK compatibility forms
  [0xff00, 0xffef], // Half-width and full-width forms
  [0x20000, 0x3134f] // Extensions B through G
];

export function isCjkChar(char: string): boolean {
  const code = char.codePointAt(0);
  if (code === undefined) {
    return false;
  }
  return CJK_RANGES.some(([start, end]) => code >= start && code <= end);
}

/**
 * True when the text is mostly Latin: more than 80% of its letters sit below
 * U+0250 (Basic Latin through Latin Extended-B). Text without letters counts as Latin.
 */
export function isLatinScript(text: string): boolean {
  let letters = 0;
  let latin = 0;
  for (const char of text) {
    if (!LETTER.test(char)) {
      continue;
    }
    letters += 1;
    const code = char.codePointAt(0) ?? 0;
    if (code < 0x250) {
      latin += 1;
    }
  }
  if (letters === 0) {
    return true;
  }
  return latin / letters > 0.8;
}

/**
 * Splits text into runs that each take one typeface. Spaces, digits and
 * punctuation stay with the run they sit in; leading ones join the first run.
 */
export function splitScriptRuns(text: string): ScriptRun[] {
  const runs: ScriptRun[] = [];
  let current: ScriptRun | null = null;
  let leading = "";
  for (const char of text) {
    const script = classifyChar(char);
    if (script === null) {
      if (current) {
        current.text += char;
      } else {
        leading += char;
      }
      continue;
    }
    if (!current) {
      current = { script, text: leading + char };
      leading = "";
    } else if (current.script === script) {
      current.text += char;
    } else {
      runs.push(current);
      current = { script, text: char };
    }
  }
  if (current) {
    runs.push(current);
  } else if (leading) {
    runs.push({ script: "latin", text: leading });
  }
  return runs;
}

/** Latin names are upper-cased and letter-spaced; other scripts are kept as typed. */
export function formatCityName(name: string): string {
  if (!isLatinScript(name)) {
    return name;
  }
  return Array.from(name.toUpperCase()).join("  ");
}

function classifyChar(char: string): TextScript | null {
  if (isCjkChar(char)) {
    return "cjk";
  }
  return LETTER.test(char) ? "latin" : null;
}
