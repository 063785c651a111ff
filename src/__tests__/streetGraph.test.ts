import { afterEach, describe, it, expect, vi } from "vitest";
import { createPosterCaches } from "../cache/posterCache";
import { MemoryBackend } from "../cache/storeBackends";
import { PosterError } from "../errors";
import { RateLimiter } from "../net/rateLimiter";
import {
  fetchStreetNetwork,
  isStreetGraph,
  mapRoadClass,
  parseStreetGraph,
  streetGraphCacheKey
} from "../osm/streetGraph";

const payload = {
  elements: [
    { type: "node", id: 1, lat: 10.0, lon: 20.0 },
    { type: "node", id: 2, lat: 10.001, lon: 20.0 },
    { type: "node", id: 3, lat: 10.002, lon: 20.0 },
    { type: "node", id: 4, lat: 10.001, lon: 19.999 },
    { type: "node", id: 5, lat: 10.001, lon: 20.001 },
    { type: "node", id: 6, lat: 10.001, lon: 20.002 },
    { type: "way", id: 100, nodes: [1, 2, 3], tags: { highway: "residential", name: "Elm Street" } },
    { type: "way", id: 200, nodes: [4, 2, 5], tags: { highway: "primary;secondary", ref: "A1" } },
    { type: "way", id: 300, nodes: [5, 6], tags: { highway: "footway" } },
    { type: "way", id: 400, nodes: [1, 99], tags: { highway: "service" } },
    { type: "way", id: 500, nodes: [3, 6], tags: { building: "yes" } }
  ]
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("parseStreetGraph", () => {
  it("splits ways at intersections", () => {
    const graph = parseStreetGraph(payload);

    expect(graph.edges.map((edge) => [edge.id, edge.from, edge.to])).toEqual([
      ["100:0", 1, 2],
      ["100:1", 2, 3],
      ["200:0", 4, 2],
      ["200:1", 2, 5],
      ["300:0", 5, 6]
    ]);
    expect(graph.nodes.map((node) => node.id).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(graph.intersectionCount).toBe(1);
  });

  it("keeps highway, class, name and geometry per edge", () => {
    const graph = parseStreetGraph(payload);
    const [elm, , primary, , footway] = graph.edges;

    expect(elm).toMatchObject({ wayId: 100, highway: "residential", roadClass: "residential", name: "Elm Street" });
    expect(elm.points).toEqual([
      { lat: 10.0, lon: 20.0 },
      { lat: 10.001, lon: 20.0 }
    ]);
    expect(primary).toMatchObject({ highway: "primary", roadClass: "primary", name: "A1" });
    expect(footway.roadClass).toBe("footway");
    expect(footway.name).toBeUndefined();
  });

  it("skips ways with missing nodes and non-highways", () => {
    const graph = parseStreetGraph(payload);
    expect(graph.edges.some((edge) => edge.wayId === 400 || edge.wayId === 500)).toBe(false);
  });

  it("produces values the cache accepts", () => {
    expect(isStreetGraph(parseStreetGraph(payload))).toBe(true);
    expect(isStreetGraph({ nodes: [], edges: [{ id: 1 }], intersectionCount: 0 })).toBe(false);
  });
});

describe("mapRoadClass", () => {
  it("folds links into their parent class", () => {
    expect(mapRoadClass("motorway_link")).toBe("motorway");
    expect(mapRoadClass("Trunk_Link")).toBe("trunk");
    expect(mapRoadClass("steps")).toBe("footway");
    expect(mapRoadClass("busway")).toBe("other");
  });
});

describe("fetchStreetNetwork", () => {
  const point = { lat: 10.001, lon: 20.0 };
  const opts = () => ({
    endpoint: "https://overpass.test/api",
    limiter: new RateLimiter({ qps: 100, burst: 10 }),
    cache: createPosterCaches(new MemoryBackend()).streetGraphs
  });

  it("keys the cache by coordinate and distance", () => {
    expect(streetGraphCacheKey({ lat: 40.7, lon: -74 }, 1234.4)).toBe("graph_40.70000_-74.00000_1234");
  });

  it("downloads once and then serves from the cache", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const fetchMock = vi.fn(async () => new Response(JSON.stringify(payload), { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    const options = opts();

    const first = await fetchStreetNetwork(point, 1500, options);
    const second = await fetchStreetNetwork(point, 1500, options);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
    expect(await options.cache.get(streetGraphCacheKey(point, 1500))).toEqual(first);
  });

  it("fails when the area has no streets", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ elements: [] }), { status: 200 }))
    );

    const error = await fetchStreetNetwork(point, 1500, opts()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PosterError);
    expect(error).toMatchObject({
      code: "network",
      message: "No streets found around this location. Check the place name or coordinates."
    });
  });
});
