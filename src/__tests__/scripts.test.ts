import { describe, it, expect } from "vitest";
import { formatCityName, isCjkChar, isLatinScript, splitScriptRuns } from "../fonts/scripts";

describe("isCjkChar", () => {
  it("recognises Han, kana, Hangul and full-width forms", () => {
    expect(isCjkChar("東")).toBe(true);
    expect(isCjkChar("ア")).toBe(true);
    expect(isCjkChar("한")).toBe(true);
    expect(isCjkChar("，")).toBe(true);
    expect(isCjkChar("A")).toBe(false);
    expect(isCjkChar("é")).toBe(false);
  });
});

describe("isLatinScript", () => {
  it("accepts Latin text with diacritics", () => {
    expect(isLatinScript("Paris")).toBe(true);
    expect(isLatinScript("São Paulo")).toBe(true);
    expect(isLatinScript("Kraków")).toBe(true);
  });

  it("rejects other scripts and mostly non-Latin mixes", () => {
    expect(isLatinScript("東京")).toBe(false);
    expect(isLatinScript("Москва")).toBe(false);
    expect(isLatinScript("Tokyo 東京")).toBe(false);
  });

  it("treats text without letters as Latin", () => {
    expect(isLatinScript("1984")).toBe(true);
    expect(isLatinScript("")).toBe(true);
  });
});

describe("splitScriptRuns", () => {
  it("splits at script boundaries", () => {
    expect(splitScriptRuns("Tokyo 東京")).toEqual([
      { script: "latin", text: "Tokyo " },
      { script: "cjk", text: "東京" }
    ]);
  });

  it("attaches neutral characters to the surrounding run", () => {
    expect(splitScriptRuns("  東京 2024")).toEqual([{ script: "cjk", text: "  東京 2024" }]);
    expect(splitScriptRuns("40.7767° N")).toEqual([{ script: "latin", text: "40.7767° N" }]);
  });

  it("returns a single Latin run for digits only and nothing for empty text", () => {
    expect(splitScriptRuns("1984")).toEqual([{ script: "latin", text: "1984" }]);
    expect(splitScriptRuns("")).toEqual([]);
  });
});

describe("formatCityName", () => {
  it("letter-spaces Latin names in upper case", () => {
    expect(formatCityName("Paris")).toBe("P  A  R  I  S");
    expect(formatCityName("São")).toBe("S  Ã  O");
  });

  it("keeps other scripts as typed", () => {
    expect(formatCityName("東京")).toBe("東京");
  });
});
