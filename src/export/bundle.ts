import { zipSync } from "fflate";

export interface PosterFile {
  filename: string;
  bytes: Uint8Array;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/** Lowercase, spaces to underscores; non-Latin letters are kept as typed. */
export function slugifyCity(city: string): string {
  const slug = city
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(/[\\/:*?"<>|]/g, "");
  return slug || "poster";
}

export function buildPosterFilename(city: string, themeId: string, date: Date = new Date()): string {
  return `${slugifyCity(city)}_${themeId}_${formatTimestamp(date)}.png`;
}

/** PNGs are already deflated, so entries are stored without recompression. */
export function buildThemeBundle(files: PosterFile[]): Blob {
  const entries: Record<string, Uint8Array> = {};
  for (const file of files) {
    entries[file.filename] = file.bytes;
  }
  const zipped = zipSync(entries, { level: 0 });
  return new Blob([new Uint8Array(zipped)], { type: "application/zip" });
}

export function buildBundleFilename(city: string, date: Date = new Date()): string {
  return `${slugifyCity(city)}_all_themes_${formatTimestamp(date)}.zip`;
}

export function downloadBlob(blob: Blob, filename: string): void {
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = filename;
  a.click();
  URL.revokeObjectURL(url);
}
