import { cssFont, type FontSet } from "../fonts/fontSet";
import type { FontWeightName } from "../fonts/googleFonts";
import { splitScriptRuns } from "../fonts/scripts";
import { createLocalProjector, createViewTransform, cropLimits, type PlanePoint } from "../geo";
import type { AreaPolygon } from "../osm/types";
import type { GeoPoint } from "../types";
import { computeTextLayout, pointsToPixels, type TextBlockLayout } from "./layout";
import { orderEdgesForDrawing } from "./roadStyle";
import type { PosterScene } from "./scene";

/** The part of CanvasRenderingContext2D the poster renderer draws with. */
export interface PosterSurface {
  fillStyle: string | CanvasGradient | CanvasPattern;
  strokeStyle: string | CanvasGradient | CanvasPattern;
  lineWidth: number;
  lineCap: CanvasLineCap;
  lineJoin: CanvasLineJoin;
  globalAlpha: number;
  font: string;
  textAlign: CanvasTextAlign;
  textBaseline: CanvasTextBaseline;
  save(): void;
  restore(): void;
  fillRect(x: number, y: number, width: number, height: number): void;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  closePath(): void;
  stroke(): void;
  fill(fillRule?: CanvasFillRule): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): { width: number };
  createLinearGradient(x0: number, y0: number, x1: number, y1: number): CanvasGradient;
}

export interface RenderOptions {
  widthPx: number;
  heightPx: number;
  dpi: number;
  fonts: FontSet;
}

// Share of the poster height covered by each edge fade.
const FADE_FRACTION = 0.25;

/**
 * Draws a poster: background, water, parks, roads, edge fades, then the text
 * block. Layer order matches the printed result; later layers cover earlier ones.
 */
export function renderPoster(surface: PosterSurface, scene: PosterScene, options: RenderOptions): void {
  const { widthPx, heightPx, dpi } = options;
  const { theme, style } = scene;
  const projector = createLocalProjector(scene.location);
  const toCanvas = createViewTransform(cropLimits(scene.fetchDistanceM, widthPx / heightPx), widthPx, heightPx);
  const place = (point: GeoPoint): PlanePoint => toCanvas(projector.project(point));

  surface.save();
  surface.fillStyle = theme.bg;
  surface.fillRect(0, 0, widthPx, heightPx);

  fillPolygons(surface, scene.water.polygons, theme.water, place);
  fillPolygons(surface, scene.parks.polygons, theme.parks, place);
  strokeRoads(surface, scene, dpi, place);

  drawFade(surface, theme.gradient_color, "bottom", widthPx, heightPx);
  drawFade(surface, theme.gradient_color, "top", widthPx, heightPx);

  const layout = computeTextLayout({
    widthIn: style.widthIn,
    heightIn: style.heightIn,
    cityScale: style.cityScale,
    countryScale: style.countryScale,
    customTextSize: style.customTextSize,
    showCoordinates: style.showCoordinates,
    hasCaption: scene.labels.caption !== null
  });
  const text = { surface, fonts: options.fonts, color: theme.text, widthPx, heightPx, dpi };
  drawTextBlock(text, scene.labels.city, layout.city);

  surface.strokeStyle = theme.text;
  surface.lineWidth = pointsToPixels(layout.divider.widthPt, dpi);
  surface.lineCap = "butt";
  surface.beginPath();
  surface.moveTo(layout.divider.x0 * widthPx, (1 - layout.divider.y) * heightPx);
  surface.lineTo(layout.divider.x1 * widthPx, (1 - layout.divider.y) * heightPx);
  surface.stroke();

  drawTextBlock(text, scene.labels.country, layout.country);
  if (layout.coordinates) {
    drawTextBlock(text, scene.labels.coordinates, layout.coordinates);
  }
  if (layout.caption && scene.labels.caption) {
    drawTextBlock(text, scene.labels.caption, layout.caption);
  }
  surface.restore();
}

function fillPolygons(
  surface: PosterSurface,
  polygons: AreaPolygon[],
  color: string,
  place: (point: GeoPoint) => PlanePoint
): void {
  if (polygons.length === 0) {
    return;
  }
  surface.fillStyle = color;
  // One path per polygon: overlapping polygons of a layer must not cancel out.
  for (const polygon of polygons) {
    surface.beginPath();
    traceRing(surface, polygon.outer, place);
    for (const hole of polygon.holes) {
      traceRing(surface, hole, place);
    }
    surface.fill("evenodd");
  }
}

function traceRing(surface: PosterSurface, ring: GeoPoint[], place: (point: GeoPoint) => PlanePoint): void {
  ring.forEach((point, index) => {
    const { x, y } = place(point);
    if (index === 0) {
      surface.moveTo(x, y);
    } else {
      surface.lineTo(x, y);
    }
  });
  surface.closePath();
}

function strokeRoads(
  surface: PosterSurface,
  scene: PosterScene,
  dpi: number,
  place: (point: GeoPoint) => PlanePoint
): void {
  const ordered = orderEdgesForDrawing(scene.graph.edges, scene.theme, scene.style.lineScale);
  surface.lineCap = "round";
  surface.lineJoin = "round";
  let activeKey = "";
  for (const { edge, stroke } of ordered) {
    const key = `${stroke.color}|${stroke.widthPt}`;
    if (key !== activeKey) {
      if (activeKey) {
        surface.stroke();
      }
      surface.strokeStyle = stroke.color;
      surface.lineWidth = pointsToPixels(stroke.widthPt, dpi);
      surface.beginPath();
      activeKey = key;
    }
    edge.points.forEach((point, index) => {
      const { x, y } = place(point);
      if (index === 0) {
        surface.moveTo(x, y);
      } else {
        surface.lineTo(x, y);
      }
    });
  }
  if (activeKey) {
    surface.stroke();
  }
}

function drawFade(
  surface: PosterSurface,
  color: string,
  edge: "top" | "bottom",
  widthPx: number,
  heightPx: number
): void {
  const bandHeight = heightPx * FADE_FRACTION;
  const outerY = edge === "bottom" ? heightPx : 0;
  const innerY = edge === "bottom" ? heightPx - bandHeight : bandHeight;
  const gradient = surface.createLinearGradient(0, outerY, 0, innerY);
  gradient.addColorStop(0, withAlpha(color, 1));
  gradient.addColorStop(1, withAlpha(color, 0));
  surface.fillStyle = gradient;
  surface.fillRect(0, Math.min(outerY, innerY), widthPx, bandHeight);
}

interface TextContext {
  surface: PosterSurface;
  fonts: FontSet;
  color: string;
  widthPx: number;
  heightPx: number;
  dpi: number;
}

function drawTextBlock(ctx: TextContext, text: string, block: TextBlockLayout): void {
  if (!text) {
    return;
  }
  const sizePx = pointsToPixels(block.sizePt, ctx.dpi);
  ctx.surface.globalAlpha = block.alpha;
  ctx.surface.fillStyle = ctx.color;
  drawMixedText(ctx.surface, text, ctx.widthPx / 2, (1 - block.y) * ctx.heightPx, sizePx, block.weight, ctx.fonts);
  ctx.surface.globalAlpha = 1;
}

/**
 * Draws text centred on `centerX`, switching typeface at every Latin/CJK
 * boundary so each script renders in its own font.
 */
export function drawMixedText(
  surface: PosterSurface,
  text: string,
  centerX: number,
  baselineY: number,
  sizePx: number,
  weight: FontWeightName,
  fonts: FontSet
): void {
  const runs = splitScriptRuns(text).map((run) => {
    const font = cssFont(run.script, weight, sizePx, fonts);
    surface.font = font;
    return { ...run, font, width: surface.measureText(run.text).width };
  });
  const totalWidth = runs.reduce((sum, run) => sum + run.width, 0);
  surface.textAlign = "left";
  surface.textBaseline = "alphabetic";
  let x = centerX - totalWidth / 2;
  for (const run of runs) {
    surface.font = run.font;
    surface.fillText(run.text, x, baselineY);
    x += run.width;
  }
}

/** `#RRGGBB` (or `#RGB`) to an rgba() string. */
export function withAlpha(hex: string, alpha: number): string {
  let digits = hex.replace(/^#/, "");
  if (digits.length === 3) {
    digits = Array.from(digits, (digit) => digit + digit).join("");
  }
  const r = Number.parseInt(digits.slice(0, 2), 16);
  const g = Number.parseInt(digits.slice(2, 4), 16);
  const b = Number.parseInt(digits.slice(4, 6), 16);
  return `rgba(${r}, ${g}, ${b}, ${alpha})`;
}
