import { describe, it, expect } from "vitest";
import { computeTextLayout, pointsToPixels, posterPixelSize, textScaleFactor } from "../poster/layout";

const base = {
  widthIn: 12,
  heightIn: 16,
  cityScale: 1,
  countryScale: 1,
  customTextSize: 18,
  showCoordinates: true,
  hasCaption: true
};

describe("computeTextLayout", () => {
  it("stacks city, divider, country, coordinates and caption", () => {
    expect(computeTextLayout(base)).toEqual({
      scaleFactor: 1,
      city: { y: 0.14, sizePt: 60, weight: "bold", alpha: 1 },
      divider: { y: 0.125, x0: 0.4, x1: 0.6, widthPt: 1 },
      country: { y: 0.1, sizePt: 22, weight: "light", alpha: 1 },
      coordinates: { y: 0.07, sizePt: 14, weight: "regular", alpha: 0.7 },
      caption: { y: 0.04, sizePt: 18, weight: "light", alpha: 0.8 }
    });
  });

  it("moves the caption up when coordinates are hidden", () => {
    const layout = computeTextLayout({ ...base, showCoordinates: false });
    expect(layout.coordinates).toBeNull();
    expect(layout.caption?.y).toBe(0.06);
  });

  it("omits the caption without text", () => {
    expect(computeTextLayout({ ...base, hasCaption: false }).caption).toBeNull();
  });

  it("scales text with the short side and the user scales", () => {
    const layout = computeTextLayout({ ...base, widthIn: 36, heightIn: 24, cityScale: 1.5, customTextSize: 10 });
    expect(layout.scaleFactor).toBe(2);
    expect(layout.city.sizePt).toBe(180);
    expect(layout.country.sizePt).toBe(44);
    expect(layout.caption?.sizePt).toBe(20);
    expect(layout.divider.widthPt).toBe(2);
  });
});

describe("unit conversion", () => {
  it("uses a 12 inch reference side", () => {
    expect(textScaleFactor(6, 8)).toBe(0.5);
  });

  it("converts points at the target DPI", () => {
    expect(pointsToPixels(72, 300)).toBe(300);
    expect(pointsToPixels(1.2, 300)).toBe(5);
  });

  it("sizes the canvas in whole pixels", () => {
    expect(posterPixelSize(12, 16, 300)).toEqual({ width: 3600, height: 4800 });
    expect(posterPixelSize(12, 16, 40)).toEqual({ width: 480, height: 640 });
    expect(posterPixelSize(8.5, 11, 300)).toEqual({ width: 2550, height: 3300 });
  });
});
