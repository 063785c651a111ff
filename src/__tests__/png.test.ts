import { describe, it, expect } from "vitest";
import { crc32, dpiToPixelsPerMeter, readPngChunks, readPngDpi, setPngDpi } from "../export/png";

const SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function chunk(type: string, data: number[]): number[] {
  const typeBytes = Array.from(type, (char) => char.charCodeAt(0));
  const body = new Uint8Array([...typeBytes, ...data]);
  const length = data.length;
  const crc = crc32(body);
  return [
    (length >>> 24) & 0xff,
    (length >>> 16) & 0xff,
    (length >>> 8) & 0xff,
    length & 0xff,
    ...body,
    (crc >>> 24) & 0xff,
    (crc >>> 16) & 0xff,
    (crc >>> 8) & 0xff,
    crc & 0xff
  ];
}

function physData(pixelsPerMeter: number): number[] {
  const bytes = [
    (pixelsPerMeter >>> 24) & 0xff,
    (pixelsPerMeter >>> 16) & 0xff,
    (pixelsPerMeter >>> 8) & 0xff,
    pixelsPerMeter & 0xff
  ];
  return [...bytes, ...bytes, 1];
}

// 1x1 RGBA image header; the IDAT payload is never decoded here.
const IHDR = chunk("IHDR", [0, 0, 0, 1, 0, 0, 0, 1, 8, 6, 0, 0, 0]);
const IDAT = chunk("IDAT", [0x78, 0x9c, 0x63, 0x00, 0x00]);
const IEND = chunk("IEND", []);

function png(...chunks: number[][]): Uint8Array {
  return new Uint8Array([...SIGNATURE, ...chunks.flat()]);
}

describe("crc32", () => {
  it("matches the reference check values", () => {
    const encode = (text: string) => new Uint8Array(Array.from(text, (char) => char.charCodeAt(0)));
    expect(crc32(encode("123456789"))).toBe(0xcbf43926);
    expect(crc32(encode("IEND"))).toBe(0xae426082);
  });
});

describe("setPngDpi", () => {
  it("converts DPI to pixels per metre", () => {
    expect(dpiToPixelsPerMeter(300)).toBe(11811);
    expect(dpiToPixelsPerMeter(72)).toBe(2835);
  });

  it("inserts pHYs right after IHDR", () => {
    const stamped = setPngDpi(png(IHDR, IDAT, IEND), 300);

    expect(readPngChunks(stamped).map((entry) => entry.type)).toEqual(["IHDR", "pHYs", "IDAT", "IEND"]);
    expect(readPngDpi(stamped)).toBe(300);
    const start = SIGNATURE.length + IHDR.length;
    expect(Array.from(stamped.subarray(start, start + 21))).toEqual(chunk("pHYs", physData(11811)));
  });

  it("replaces an existing resolution", () => {
    const original = png(IHDR, IDAT, chunk("pHYs", physData(2835)), IEND);
    expect(readPngDpi(original)).toBe(72);

    const stamped = setPngDpi(original, 300);

    expect(readPngChunks(stamped).map((entry) => entry.type)).toEqual(["IHDR", "pHYs", "IDAT", "IEND"]);
    expect(readPngDpi(stamped)).toBe(300);
    expect(stamped.length).toBe(original.length);
  });

  it("reports images without a resolution", () => {
    expect(readPngDpi(png(IHDR, IDAT, IEND))).toBeNull();
  });

  it("rejects data that is not a PNG", () => {
    expect(() => setPngDpi(new Uint8Array([1, 2, 3]), 300)).toThrow("Not a PNG image.");
    expect(() => setPngDpi(png(IDAT, IEND), 300)).toThrow("PNG does not start with IHDR.");
    expect(() => setPngDpi(png(IHDR.slice(0, 10)), 300)).toThrow("Truncated PNG chunk IHDR.");
  });
});
