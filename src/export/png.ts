import { EXPORT_DPI } from "../config";
import { PosterError } from "../errors";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const METERS_PER_INCH = 0.0254;

const CRC_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n += 1) {
    let c = n;
    for (let k = 0; k < 8; k += 1) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

export function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

export function dpiToPixelsPerMeter(dpi: number): number {
  return Math.round(dpi / METERS_PER_INCH);
}

interface PngChunk {
  type: string;
  offset: number;
  /** Offset just past the chunk's CRC. */
  end: number;
}

export function readPngChunks(bytes: Uint8Array): PngChunk[] {
  if (bytes.length < PNG_SIGNATURE.length || PNG_SIGNATURE.some((value, index) => bytes[index] !== value)) {
    throw new PosterError("render", "Not a PNG image.");
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const chunks: PngChunk[] = [];
  let offset = PNG_SIGNATURE.length;
  while (offset + 8 <= bytes.length) {
    const length = view.getUint32(offset);
    const type = String.fromCharCode(...bytes.subarray(offset + 4, offset + 8));
    const end = offset + 12 + length;
    if (end > bytes.length) {
      throw new PosterError("render", `Truncated PNG chunk ${type}.`);
    }
    chunks.push({ type, offset, end });
    offset = end;
    if (type === "IEND") {
      break;
    }
  }
  return chunks;
}

function buildPhysChunk(dpi: number): Uint8Array {
  const chunk = new Uint8Array(21);
  const view = new DataView(chunk.buffer);
  const ppm = dpiToPixelsPerMeter(dpi);
  view.setUint32(0, 9);
  chunk.set([0x70, 0x48, 0x59, 0x73], 4); // "pHYs"
  view.setUint32(8, ppm);
  view.setUint32(12, ppm);
  chunk[16] = 1; // unit: metre
  view.setUint32(17, crc32(chunk.subarray(4, 17)));
  return chunk;
}

/**
 * Stamps the print resolution into a PNG. The pHYs chunk goes right after IHDR;
 * an existing one is dropped.
 */
export function setPngDpi(bytes: Uint8Array, dpi: number): Uint8Array {
  const chunks = readPngChunks(bytes);
  const header = chunks[0];
  if (!header || header.type !== "IHDR") {
    throw new PosterError("render", "PNG does not start with IHDR.");
  }
  const phys = buildPhysChunk(dpi);
  const kept = chunks.filter((chunk) => chunk.type !== "pHYs");
  const keptLength = kept.reduce((sum, chunk) => sum + (chunk.end - chunk.offset), 0);
  const output = new Uint8Array(PNG_SIGNATURE.length + keptLength + phys.length);
  output.set(PNG_SIGNATURE, 0);
  let cursor = PNG_SIGNATURE.length;
  for (const chunk of kept) {
    output.set(bytes.subarray(chunk.offset, chunk.end), cursor);
    cursor += chunk.end - chunk.offset;
    if (chunk === header) {
      output.set(phys, cursor);
      cursor += phys.length;
    }
  }
  return output;
}

/** Reads the pHYs resolution back as DPI, or null when the PNG carries none. */
export function readPngDpi(bytes: Uint8Array): number | null {
  const phys = readPngChunks(bytes).find((chunk) => chunk.type === "pHYs");
  if (!phys) {
    return null;
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (bytes[phys.offset + 16] !== 1) {
    return null;
  }
  return Math.round(view.getUint32(phys.offset + 8) * METERS_PER_INCH);
}

export async function canvasToPngBytes(canvas: HTMLCanvasElement): Promise<Uint8Array> {
  const blob = await new Promise<Blob>((resolve, reject) => {
    canvas.toBlob((value) => {
      if (!value) {
        reject(new PosterError("render", "Failed to encode PNG."));
        return;
      }
      resolve(value);
    }, "image/png");
  });
  const buffer = await blob.arrayBuffer();
  return new Uint8Array(buffer);
}

export async function exportPosterPng(canvas: HTMLCanvasElement, dpi = EXPORT_DPI): Promise<Uint8Array> {
  return setPngDpi(await canvasToPngBytes(canvas), dpi);
}
