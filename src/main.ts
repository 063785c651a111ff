import "./styles.css";
import { createPosterCaches } from "./cache/posterCache";
import { createCoalescedTask } from "./coalesce";
import { createDefaultBackend } from "./cache/storeBackends";
import { appConfig, EXPORT_DPI, PREVIEW_DPI } from "./config";
import { describeError, GeocodingError, isAbortError, PosterError } from "./errors";
import {
  buildBundleFilename,
  buildPosterFilename,
  buildThemeBundle,
  downloadBlob,
  type PosterFile
} from "./export/bundle";
import { exportPosterPng } from "./export/png";
import { ensureGlyphs, loadFontSet, type FontSet } from "./fonts/fontSet";
import { createLogger, setDebugLogging } from "./log";
import { createPosterServices, generatePoster } from "./poster/generate";
import { posterPixelSize } from "./poster/layout";
import { renderPoster } from "./poster/render";
import { withSettings, withTheme, type PosterScene } from "./poster/scene";
import { createDefaultSettings, loadAutosave, sanitizeSettings, saveAutosave } from "./settings";
import { listThemes } from "./themes";
import type { PosterSettings } from "./types";
import { getState, isBusy, isFetching, setPhase, subscribe } from "./workflowState";

const log = createLogger("app");

type ElementConstructor<T extends HTMLElement> = { new (): T; prototype: T };

function requireElement<T extends HTMLElement>(id: string, ctor: ElementConstructor<T>): T {
  const element = document.getElementById(id);
  if (!(element instanceof ctor)) {
    throw new Error(`Missing #${id} in the page`);
  }
  return element;
}

const TEXT_FIELDS = [
  "city",
  "country",
  "displayCity",
  "displayCountry",
  "customText",
  "latitude",
  "longitude",
  "latinFontFamily"
] as const;
const NUMBER_FIELDS = [
  "customTextSize",
  "distanceM",
  "widthIn",
  "heightIn",
  "cityScale",
  "countryScale",
  "lineScale"
] as const;
const CHECKBOX_FIELDS = ["showCoordinates", "manualCoordinates"] as const;

// Changing any of these invalidates the downloaded map data.
const FETCH_FIELDS = [
  "city",
  "country",
  "manualCoordinates",
  "latitude",
  "longitude",
  "distanceM",
  "widthIn",
  "heightIn"
] as const;

async function init() {
  if (appConfig.debug) {
    setDebugLogging(true);
  }

  const form = requireElement("posterForm", HTMLFormElement);
  const themeList = requireElement("themeList", HTMLDivElement);
  const manualFields = requireElement("manualFields", HTMLDivElement);
  const distanceValue = requireElement("distanceValue", HTMLSpanElement);
  const refreshCache = requireElement("refreshCache", HTMLInputElement);
  const btnGenerate = requireElement("btnGenerate", HTMLButtonElement);
  const btnCancel = requireElement("btnCancel", HTMLButtonElement);
  const btnDownload = requireElement("btnDownload", HTMLButtonElement);
  const btnDownloadAll = requireElement("btnDownloadAll", HTMLButtonElement);
  const previewCanvas = requireElement("previewCanvas", HTMLCanvasElement);
  const statusMessage = requireElement("statusMessage", HTMLParagraphElement);
  const warningBanner = requireElement("warningBanner", HTMLDivElement);
  const warningText = requireElement("warningText", HTMLSpanElement);
  const btnUseManual = requireElement("btnUseManual", HTMLButtonElement);

  const textInputs = Object.fromEntries(TEXT_FIELDS.map((id) => [id, requireElement(id, HTMLInputElement)]));
  const numberInputs = Object.fromEntries(NUMBER_FIELDS.map((id) => [id, requireElement(id, HTMLInputElement)]));
  const checkboxInputs = Object.fromEntries(CHECKBOX_FIELDS.map((id) => [id, requireElement(id, HTMLInputElement)]));

  const caches = createPosterCaches(createDefaultBackend(appConfig.cacheNamespace));
  let settings: PosterSettings = loadAutosave() ?? createDefaultSettings();
  let scene: PosterScene | null = null;
  let sceneSettings: PosterSettings | null = null;
  let controller: AbortController | null = null;
  let autosaveTimer: number | null = null;
  const fontSets = new Map<string, Promise<FontSet>>();
  // Keystrokes during a render fold into one more pass over the latest scene.
  const drawPreview = createCoalescedTask(async () => {
    const current = scene;
    if (current) {
      await drawScene(previewCanvas, current, PREVIEW_DPI);
    }
  });

  renderThemeOptions();
  writeForm(settings);
  syncFormState();

  subscribe((state) => {
    const busy = isBusy(state.phase);
    btnGenerate.disabled = busy;
    btnCancel.disabled = !busy;
    btnDownload.disabled = busy || !scene;
    btnDownloadAll.disabled = busy || !scene;
    if (state.phase !== "error") {
      statusMessage.textContent = describePhase(state.phase, state.detail);
    }
  });

  form.addEventListener("input", () => {
    settings = readForm();
    syncFormState();
    scheduleAutosave();
    if (scene && sceneSettings && !isFetching() && !needsRefetch(sceneSettings, settings)) {
      scene = withSettings(scene, settings);
      refreshPreview();
    }
  });

  form.addEventListener("submit", (event) => {
    event.preventDefault();
    void generate();
  });
  btnCancel.addEventListener("click", () => {
    controller?.abort();
  });
  btnUseManual.addEventListener("click", () => {
    checkboxInputs.manualCoordinates.checked = true;
    settings = readForm();
    syncFormState();
    scheduleAutosave();
    hideWarning();
    textInputs.latitude.focus();
  });
  btnDownload.addEventListener("click", () => {
    void runTask(() => downloadCurrent());
  });
  btnDownloadAll.addEventListener("click", () => {
    void runTask(() => downloadAllThemes());
  });

  async function generate() {
    if (isBusy()) {
      return;
    }
    const requested = readForm();
    settings = requested;
    hideWarning();
    controller = new AbortController();
    const { signal } = controller;
    const services = createPosterServices(appConfig, caches, { refresh: refreshCache.checked });
    try {
      const next = await generatePoster(requested, services, {
        signal,
        onPhase: (phase, detail) => setPhase(phase, detail ?? null)
      });
      // Edits made while downloading apply unless they need other map data.
      scene = needsRefetch(requested, settings) ? next : withSettings(next, settings);
      sceneSettings = requested;
      setPhase("rendering", "preview");
      await drawPreview();
      const where = next.location.address ?? `${next.location.lat}, ${next.location.lon}`;
      setPhase("ready", `${where} (${next.graph.edges.length} street segments)`);
    } catch (error) {
      handleError(error);
    } finally {
      controller = null;
    }
  }

  async function runTask(task: () => Promise<void>) {
    try {
      await task();
    } catch (error) {
      handleError(error);
    }
  }

  function handleError(error: unknown) {
    if (isAbortError(error)) {
      setPhase("idle", "Cancelled.");
      return;
    }
    log.error(error);
    if (error instanceof GeocodingError) {
      showWarning(`${error.message} Enter the latitude and longitude instead?`);
    }
    setPhase("error", describeError(error));
    statusMessage.textContent = describeError(error);
  }

  function refreshPreview() {
    const pass = drawPreview();
    if (!pass) {
      return;
    }
    const idle = !isBusy();
    const detail = getState().detail;
    if (idle) {
      setPhase("rendering", "preview");
    }
    void runTask(async () => {
      await pass;
      if (idle) {
        setPhase("ready", detail);
      }
    });
  }

  async function downloadCurrent() {
    const current = scene;
    if (!current) {
      return;
    }
    setPhase("rendering", `${EXPORT_DPI} DPI`);
    const bytes = await renderPng(current);
    const blob = new Blob([new Uint8Array(bytes)], { type: "image/png" });
    downloadBlob(blob, buildPosterFilename(current.place, current.themeId));
    setPhase("ready", "PNG exported.");
  }

  async function downloadAllThemes() {
    const current = scene;
    if (!current) {
      return;
    }
    const themes = listThemes();
    const files: PosterFile[] = [];
    for (const [index, entry] of themes.entries()) {
      setPhase("rendering", `${entry.theme.name} (${index + 1}/${themes.length})`);
      const themed = withTheme(current, entry.id);
      files.push({ filename: buildPosterFilename(current.place, entry.id), bytes: await renderPng(themed) });
    }
    downloadBlob(buildThemeBundle(files), buildBundleFilename(current.place));
    setPhase("ready", `Exported ${files.length} themes.`);
  }

  async function renderPng(target: PosterScene): Promise<Uint8Array> {
    const canvas = document.createElement("canvas");
    await drawScene(canvas, target, EXPORT_DPI);
    return exportPosterPng(canvas, EXPORT_DPI);
  }

  async function drawScene(canvas: HTMLCanvasElement, target: PosterScene, dpi: number) {
    const { width, height } = posterPixelSize(target.style.widthIn, target.style.heightIn, dpi);
    canvas.width = width;
    canvas.height = height;
    const context = canvas.getContext("2d");
    if (!context) {
      throw new PosterError("render", "Canvas 2D is not available in this browser.");
    }
    const fonts = await getFontSet(settings.latinFontFamily);
    await ensureGlyphs(fonts, [
      { text: target.labels.city, weight: "bold" },
      { text: target.labels.country, weight: "light" },
      { text: target.labels.coordinates, weight: "regular" },
      { text: target.labels.caption ?? "", weight: "light" }
    ]);
    renderPoster(context, target, { widthPx: width, heightPx: height, dpi, fonts });
  }

  function getFontSet(family: string | undefined): Promise<FontSet> {
    const key = family?.trim() ?? "";
    let pending = fontSets.get(key);
    if (!pending) {
      pending = loadFontSet({ latinFamily: key, cssUrl: appConfig.googleFontsCssUrl });
      fontSets.set(key, pending);
    }
    return pending;
  }

  function renderThemeOptions() {
    themeList.replaceChildren(
      ...listThemes().map(({ id, theme }) => {
        const label = document.createElement("label");
        label.className = "theme-option";
        const input = document.createElement("input");
        input.type = "radio";
        input.name = "themeId";
        input.value = id;
        const swatch = document.createElement("span");
        swatch.className = "theme-swatch";
        swatch.style.background = theme.bg;
        swatch.style.borderColor = theme.road_primary;
        const name = document.createElement("strong");
        name.textContent = theme.name;
        const description = document.createElement("small");
        description.textContent = theme.description ?? "";
        label.append(input, swatch, name, description);
        return label;
      })
    );
  }

  function readForm(): PosterSettings {
    const raw: Record<string, unknown> = {};
    for (const id of TEXT_FIELDS) {
      raw[id] = textInputs[id].value;
    }
    for (const id of NUMBER_FIELDS) {
      raw[id] = numberInputs[id].value;
    }
    for (const id of CHECKBOX_FIELDS) {
      raw[id] = checkboxInputs[id].checked;
    }
    const selected = themeList.querySelector<HTMLInputElement>("input[name='themeId']:checked");
    raw.themeId = selected?.value ?? settings.themeId;
    const { settings: next, warnings } = sanitizeSettings(raw);
    if (warnings.length > 0) {
      showWarning(warnings.join(" "), false);
    }
    return next;
  }

  function writeForm(values: PosterSettings) {
    for (const id of TEXT_FIELDS) {
      textInputs[id].value = values[id] ?? "";
    }
    for (const id of NUMBER_FIELDS) {
      numberInputs[id].value = String(values[id]);
    }
    for (const id of CHECKBOX_FIELDS) {
      checkboxInputs[id].checked = values[id];
    }
    themeList.querySelectorAll<HTMLInputElement>("input[name='themeId']").forEach((input) => {
      input.checked = input.value === values.themeId;
    });
  }

  function syncFormState() {
    manualFields.hidden = !settings.manualCoordinates;
    distanceValue.textContent = `${(settings.distanceM / 1000).toFixed(1)} km`;
  }

  function scheduleAutosave() {
    if (autosaveTimer) {
      window.clearTimeout(autosaveTimer);
    }
    autosaveTimer = window.setTimeout(() => {
      saveAutosave(settings);
    }, 300);
  }

  function showWarning(message: string, offerManual = true) {
    warningText.textContent = message;
    btnUseManual.hidden = !offerManual;
    warningBanner.hidden = false;
  }

  function hideWarning() {
    warningBanner.hidden = true;
  }
}

function needsRefetch(previous: PosterSettings, next: PosterSettings): boolean {
  return FETCH_FIELDS.some((key) => previous[key] !== next[key]);
}

function describePhase(phase: ReturnType<typeof getState>["phase"], detail: string | null): string {
  switch (phase) {
    case "idle":
      return detail ?? "Enter a place and press Generate.";
    case "geocoding":
      return `Locating ${detail ?? "place"}…`;
    case "fetching":
      return `Downloading streets, water and parks (${detail ?? ""})…`;
    case "rendering":
      return `Rendering ${detail ?? ""}…`;
    case "ready":
      return detail ? `Ready: ${detail}` : "Ready.";
    case "error":
      return detail ?? "Something went wrong.";
  }
}

void init().catch((err) => {
  console.error(err);
  const statusMessage = document.getElementById("statusMessage");
  if (statusMessage) {
    statusMessage.textContent = `Fatal error: ${describeError(err)}`;
  }
});
