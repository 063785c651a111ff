import { describe, it, expect } from "vitest";
import {
  boundsAroundPoint,
  compensatedDistance,
  createLocalProjector,
  createViewTransform,
  cropLimits
} from "../geo";

describe("compensatedDistance", () => {
  it("widens the fetch radius by the aspect ratio", () => {
    expect(compensatedDistance(10000, 12, 16)).toBeCloseTo(3333.333, 3);
    expect(compensatedDistance(10000, 16, 12)).toBeCloseTo(3333.333, 3);
    expect(compensatedDistance(4000, 10, 10)).toBe(1000);
  });
});

describe("cropLimits", () => {
  it("cuts the short axis of a portrait poster", () => {
    expect(cropLimits(1000, 0.75)).toEqual({ minX: -750, maxX: 750, minY: -1000, maxY: 1000 });
  });

  it("cuts the short axis of a landscape poster", () => {
    expect(cropLimits(1000, 2)).toEqual({ minX: -1000, maxX: 1000, minY: -500, maxY: 500 });
  });
});

describe("createViewTransform", () => {
  it("maps plane metres onto canvas pixels with y down", () => {
    const toCanvas = createViewTransform(cropLimits(1000, 0.75), 300, 400);
    expect(toCanvas({ x: 0, y: 0 })).toEqual({ x: 150, y: 200 });
    expect(toCanvas({ x: 750, y: 1000 })).toEqual({ x: 300, y: 0 });
    expect(toCanvas({ x: -750, y: -1000 })).toEqual({ x: 0, y: 400 });
  });
});

describe("createLocalProjector", () => {
  it("projects to metres around the centre and back", () => {
    const projector = createLocalProjector({ lat: 0, lon: 0 });
    expect(projector.project({ lat: 0, lon: 0 })).toEqual({ x: 0, y: 0 });
    const north = projector.project({ lat: 1, lon: 0 });
    expect(north.x).toBe(0);
    expect(north.y).toBeCloseTo(111195.084, 3);
  });

  it("round-trips points near a mid-latitude centre", () => {
    const projector = createLocalProjector({ lat: 48.8566, lon: 2.3522 });
    const point = { lat: 48.87, lon: 2.33 };
    const back = projector.unproject(projector.project(point));
    expect(back.lat).toBeCloseTo(point.lat, 9);
    expect(back.lon).toBeCloseTo(point.lon, 9);
  });
});

describe("boundsAroundPoint", () => {
  it("builds a box reaching the distance along each axis", () => {
    const bounds = boundsAroundPoint({ lat: 0, lon: 0 }, 1000);
    expect(bounds.north).toBeCloseTo(0.0089932, 7);
    expect(bounds.south).toBeCloseTo(-0.0089932, 7);
    expect(bounds.east).toBeCloseTo(0.0089932, 7);
    expect(bounds.west).toBeCloseTo(-0.0089932, 7);
  });

  it("clamps near the poles", () => {
    const bounds = boundsAroundPoint({ lat: 89.999, lon: 0 }, 5000);
    expect(bounds.north).toBe(90);
  });
});
