import { afterEach, describe, it, expect, vi } from "vitest";
import { createPosterCaches } from "../cache/posterCache";
import { MemoryBackend } from "../cache/storeBackends";
import { resolveConfig } from "../config";
import { CoordinateParseError, GeocodingError, isAbortError } from "../errors";
import type { AreaFeatures, AreaLayer, StreetGraph } from "../osm/types";
import { createPosterServices, generatePoster, type PosterServices } from "../poster/generate";
import { createDefaultSettings } from "../settings";
import type { GeoPoint, ResolvedLocation } from "../types";
import type { GenerationPhase } from "../workflowState";

const GRAPH: StreetGraph = {
  nodes: [
    { id: 1, lat: 38.7223, lon: -9.1393 },
    { id: 2, lat: 38.7226, lon: -9.139 }
  ],
  edges: [
    {
      id: "10:0",
      wayId: 10,
      from: 1,
      to: 2,
      highway: "residential",
      roadClass: "residential",
      points: [
        { lat: 38.7223, lon: -9.1393 },
        { lat: 38.7226, lon: -9.139 }
      ]
    }
  ],
  intersectionCount: 0
};

function fakeServices(location: ResolvedLocation = { lat: 38.7223, lon: -9.1393, source: "geocoder" }) {
  const geocode = vi.fn(async (_city: string, _country: string, _signal?: AbortSignal) => location);
  const fetchStreets = vi.fn(async (_point: GeoPoint, _distanceM: number, _signal?: AbortSignal) => GRAPH);
  const fetchAreas = vi.fn(
    async (_point: GeoPoint, _distanceM: number, layer: AreaLayer, _signal?: AbortSignal): Promise<AreaFeatures> => ({
      layer,
      polygons: []
    })
  );
  const services: PosterServices = { geocode, fetchStreets, fetchAreas };
  return { services, geocode, fetchStreets, fetchAreas };
}

function quietLogs() {
  vi.spyOn(console, "info").mockImplementation(() => {});
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("generatePoster", () => {
  it("geocodes the city and fetches map data at the compensated distance", async () => {
    const { services, geocode, fetchStreets, fetchAreas } = fakeServices();
    const phases: Array<[GenerationPhase, string | undefined]> = [];
    const settings = { ...createDefaultSettings(), city: "Lisbon", country: "Portugal", themeId: "noir" };

    const scene = await generatePoster(settings, services, {
      onPhase: (phase, detail) => phases.push([phase, detail])
    });

    expect(geocode).toHaveBeenCalledWith("Lisbon", "Portugal", undefined);
    expect(phases).toEqual([
      ["geocoding", "Lisbon"],
      ["fetching", "3333 m"]
    ]);
    expect(scene.fetchDistanceM).toBeCloseTo(3333.333, 3);
    expect(fetchStreets.mock.calls[0][1]).toBeCloseTo(3333.333, 3);
    expect(fetchAreas.mock.calls.map((call) => call[2])).toEqual(["water", "parks"]);
    expect(scene.graph).toBe(GRAPH);
    expect(scene.water).toEqual({ layer: "water", polygons: [] });
    expect(scene.parks).toEqual({ layer: "parks", polygons: [] });
    expect(scene.themeId).toBe("noir");
    expect(scene.place).toBe("Lisbon");
    expect(scene.labels.city).toBe("L  I  S  B  O  N");
    expect(scene.labels.coordinates).toBe("38.7223° N / 9.1393° W");
  });

  it("uses manual coordinates without calling the geocoder", async () => {
    quietLogs();
    const { services, geocode, fetchStreets } = fakeServices();
    const settings = {
      ...createDefaultSettings(),
      city: "Central Park",
      manualCoordinates: true,
      latitude: "40°46'36\"N",
      longitude: "73.9713 W"
    };

    const scene = await generatePoster(settings, services);

    expect(geocode).not.toHaveBeenCalled();
    expect(scene.location.source).toBe("manual");
    expect(scene.location.lat).toBeCloseTo(40.776667, 6);
    expect(scene.location.lon).toBe(-73.9713);
    expect(fetchStreets.mock.calls[0][0]).toBe(scene.location);
  });

  it("rejects invalid manual coordinates before fetching", async () => {
    const { services, fetchStreets } = fakeServices();
    const settings = { ...createDefaultSettings(), manualCoordinates: true, latitude: "95", longitude: "10" };

    await expect(generatePoster(settings, services)).rejects.toBeInstanceOf(CoordinateParseError);
    expect(fetchStreets).not.toHaveBeenCalled();
  });

  it("passes geocoding failures to the caller", async () => {
    const { services, fetchStreets, geocode } = fakeServices();
    geocode.mockRejectedValueOnce(new GeocodingError("not_found", "Atlantis", "No match for Atlantis."));
    const settings = { ...createDefaultSettings(), city: "Atlantis" };

    await expect(generatePoster(settings, services)).rejects.toMatchObject({
      name: "GeocodingError",
      code: "geocode_not_found"
    });
    expect(fetchStreets).not.toHaveBeenCalled();
  });

  it("stops once the run is cancelled", async () => {
    quietLogs();
    const { services, fetchStreets } = fakeServices();
    const controller = new AbortController();
    controller.abort();
    const settings = { ...createDefaultSettings(), manualCoordinates: true, latitude: "10", longitude: "20" };

    const error = await generatePoster(settings, services, { signal: controller.signal }).catch(
      (reason: unknown) => reason
    );

    expect(isAbortError(error)).toBe(true);
    expect(fetchStreets).not.toHaveBeenCalled();
  });
});

describe("createPosterServices", () => {
  it("geocodes through the configured endpoint and caches the answer", async () => {
    quietLogs();
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response(JSON.stringify([{ lat: "38.7223", lon: "-9.1393", display_name: "Lisboa, Portugal" }]), {
        status: 200
      })
    );
    vi.stubGlobal("fetch", fetchMock);
    const config = resolveConfig({ VITE_NOMINATIM_URL: "https://geocoder.test/search" });
    const services = createPosterServices(config, createPosterCaches(new MemoryBackend()));

    const first = await services.geocode("Lisbon", "Portugal");
    const second = await services.geocode("Lisbon", "Portugal");

    const url = new URL(fetchMock.mock.calls[0][0]);
    expect(url.origin + url.pathname).toBe("https://geocoder.test/search");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(first).toEqual({ lat: 38.7223, lon: -9.1393, address: "Lisboa, Portugal", source: "geocoder" });
    expect(second.source).toBe("cache");
  });
});
