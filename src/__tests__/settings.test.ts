import { describe, it, expect, vi } from "vitest";
import { AUTOSAVE_KEY, createDefaultSettings, loadAutosave, sanitizeSettings, saveAutosave } from "../settings";

function memoryStorage() {
  const values = new Map<string, string>();
  return {
    getItem: (key: string) => values.get(key) ?? null,
    setItem: (key: string, value: string) => {
      values.set(key, value);
    }
  };
}

describe("createDefaultSettings", () => {
  it("starts with a 12 x 16 in terracotta poster", () => {
    expect(createDefaultSettings()).toEqual({
      city: "",
      country: "",
      customText: "",
      customTextSize: 18,
      showCoordinates: true,
      manualCoordinates: false,
      latitude: "",
      longitude: "",
      themeId: "terracotta",
      distanceM: 10000,
      widthIn: 12,
      heightIn: 16,
      cityScale: 1,
      countryScale: 1,
      lineScale: 1
    });
  });
});

describe("sanitizeSettings", () => {
  it("keeps valid fields and numeric strings", () => {
    const { settings, warnings } = sanitizeSettings({
      city: "Lisbon",
      country: "Portugal",
      displayCity: "Lisboa",
      showCoordinates: false,
      distanceM: "6000",
      widthIn: 18,
      heightIn: "24",
      customTextSize: 24,
      lineScale: 1.5
    });

    expect(warnings).toEqual(["Height 24 in exceeds the 20 in maximum; using 20 in."]);
    expect(settings).toMatchObject({
      city: "Lisbon",
      country: "Portugal",
      displayCity: "Lisboa",
      showCoordinates: false,
      distanceM: 6000,
      widthIn: 18,
      heightIn: 20,
      customTextSize: 24,
      lineScale: 1.5
    });
  });

  it("clamps out-of-range numbers and reports them", () => {
    const { settings, warnings } = sanitizeSettings({ distanceM: 50000, widthIn: -2, cityScale: 9 });

    expect(settings.distanceM).toBe(20000);
    expect(settings.widthIn).toBe(12);
    expect(settings.cityScale).toBe(5);
    expect(warnings).toEqual([
      "Distance 50000 m is outside 2000-20000 m; using 20000 m.",
      "Width must be positive; using 12 in."
    ]);
  });

  it("drops fields of the wrong type", () => {
    const { settings, warnings } = sanitizeSettings({
      city: 42,
      themeId: "  ",
      latinFontFamily: " ",
      showCoordinates: "no",
      distanceM: "far",
      customTextSize: 0
    });

    expect(settings).toEqual(createDefaultSettings());
    expect(warnings).toEqual([]);
  });

  it("ignores keys the form does not have", () => {
    const { settings } = sanitizeSettings({ country: "Japan", countryLabel: "Nippon" });

    expect(settings).toEqual({ ...createDefaultSettings(), country: "Japan" });
    expect("countryLabel" in settings).toBe(false);
  });

  it("falls back to defaults for non-objects", () => {
    expect(sanitizeSettings(null)).toEqual({ settings: createDefaultSettings(), warnings: [] });
    expect(sanitizeSettings("Paris")).toEqual({ settings: createDefaultSettings(), warnings: [] });
  });
});

describe("autosave", () => {
  it("restores what was saved", () => {
    const storage = memoryStorage();
    const settings = { ...createDefaultSettings(), city: "Kyoto", themeId: "noir", latinFontFamily: "Lato" };

    saveAutosave(settings, storage);

    expect(loadAutosave(storage)).toEqual(settings);
  });

  it("returns null when nothing was saved", () => {
    expect(loadAutosave(memoryStorage())).toBeNull();
  });

  it("ignores unreadable data", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const storage = memoryStorage();
    storage.setItem(AUTOSAVE_KEY, "{not json");

    expect(loadAutosave(storage)).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("logs the fields it had to clamp", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const storage = memoryStorage();
    storage.setItem(AUTOSAVE_KEY, JSON.stringify({ widthIn: 25 }));

    expect(loadAutosave(storage)?.widthIn).toBe(20);
    expect(warn).toHaveBeenCalledWith("[settings]", "Width 25 in exceeds the 20 in maximum; using 20 in.");
  });
});
