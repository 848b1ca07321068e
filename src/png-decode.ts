/**
 * Raw PNG decoder to 8-bit RGBA (no canvas, no native image library).
 * Handles non-interlaced grayscale, RGB, palette, gray+alpha and RGBA images,
 * including the 1-bit grayscale files share images are stored as.
 */

import pako from "pako";
import { BinaryGrid, GridWriter } from "./binary-grid";
import { ImageFormatError } from "./errors";
import type { RgbaImage } from "./types";

const PNG_SIG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/** Luma threshold separating "off" (dark) from "on" (light) pixels. */
export const LUMA_THRESHOLD = 128;

const CHANNELS: Record<number, number> = { 0: 1, 2: 3, 3: 1, 4: 2, 6: 4 };
const ALLOWED_DEPTHS: Record<number, number[]> = {
  0: [1, 2, 4, 8],
  2: [8],
  3: [1, 2, 4, 8],
  4: [8],
  6: [8],
};

function readU32(b: Uint8Array, off: number): number {
  return ((b[off]! << 24) | (b[off + 1]! << 16) | (b[off + 2]! << 8) | b[off + 3]!) >>> 0;
}

function paeth(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  return pa <= pb && pa <= pc ? a : pb <= pc ? b : c;
}

/**
 * Apply PNG row filters. rowBytes is the packed scanline length; bpp is the
 * filter unit (bytes per complete pixel, at least 1).
 */
function unfilter(raw: Uint8Array, height: number, rowBytes: number, bpp: number): Uint8Array {
  const out = new Uint8Array(height * rowBytes);
  const stride = 1 + rowBytes;
  for (let y = 0; y < height; y++) {
    const rawOff = y * stride;
    const filter = raw[rawOff]!;
    if (filter > 4) throw new ImageFormatError(`Unknown PNG filter type ${filter}`);
    const row = y * rowBytes;
    const prev = y > 0 ? row - rowBytes : -1;
    for (let x = 0; x < rowBytes; x++) {
      const a = x >= bpp ? out[row + x - bpp]! : 0;
      const b = prev >= 0 ? out[prev + x]! : 0;
      const c = x >= bpp && prev >= 0 ? out[prev + x - bpp]! : 0;
      const pred =
        filter === 1 ? a : filter === 2 ? b : filter === 3 ? (a + b) >>> 1 : filter === 4 ? paeth(a, b, c) : 0;
      out[row + x] = (raw[rawOff + 1 + x]! + pred) & 0xff;
    }
  }
  return out;
}

/** Read one sample of `depth` bits at sample index i of a packed row. */
function sampleAt(row: Uint8Array, rowOff: number, i: number, depth: number): number {
  if (depth === 8) return row[rowOff + i]!;
  const bitOff = i * depth;
  const byte = row[rowOff + (bitOff >> 3)]!;
  const shift = 8 - depth - (bitOff & 7);
  return (byte >> shift) & ((1 << depth) - 1);
}

/**
 * Decode PNG bytes to RGBA (8-bit per channel).
 */
export function decodePngToRGBA(bytes: Uint8Array): RgbaImage {
  const u8 = bytes;
  if (u8.length < 8 || PNG_SIG.some((v, i) => u8[i] !== v)) {
    throw new ImageFormatError("Invalid PNG signature");
  }
  let off = 8;
  let width = 0;
  let height = 0;
  let bitDepth = 0;
  let colorType = -1;
  let palette: Uint8Array | null = null;
  let paletteAlpha: Uint8Array | null = null;
  const idatChunks: Uint8Array[] = [];

  while (off + 12 <= u8.length) {
    const len = readU32(u8, off);
    const type = String.fromCharCode(u8[off + 4]!, u8[off + 5]!, u8[off + 6]!, u8[off + 7]!);
    const dataStart = off + 8;
    const dataEnd = dataStart + len;
    if (dataEnd > u8.length) throw new ImageFormatError("PNG chunk overflow");
    if (type === "IHDR") {
      if (len < 13) throw new ImageFormatError("IHDR too short");
      width = readU32(u8, dataStart);
      height = readU32(u8, dataStart + 4);
      bitDepth = u8[dataStart + 8]!;
      colorType = u8[dataStart + 9]!;
      const interlace = u8[dataStart + 12]!;
      if (!(ALLOWED_DEPTHS[colorType] ?? []).includes(bitDepth)) {
        throw new ImageFormatError(`Unsupported PNG format: color type ${colorType}, bit depth ${bitDepth}`);
      }
      if (interlace !== 0) throw new ImageFormatError("Interlaced PNG is not supported");
    } else if (type === "PLTE") {
      palette = u8.subarray(dataStart, dataEnd);
    } else if (type === "tRNS") {
      paletteAlpha = u8.subarray(dataStart, dataEnd);
    } else if (type === "IDAT") {
      idatChunks.push(u8.subarray(dataStart, dataEnd));
    } else if (type === "IEND") {
      break;
    }
    off = dataEnd + 4;
  }

  if (width <= 0 || height <= 0) throw new ImageFormatError("PNG IHDR not found");
  if (colorType === 3 && !palette) throw new ImageFormatError("Palette PNG without PLTE chunk");
  const combined = new Uint8Array(idatChunks.reduce((s, c) => s + c.length, 0));
  let pos = 0;
  for (const c of idatChunks) {
    combined.set(c, pos);
    pos += c.length;
  }
  let raw: Uint8Array;
  try {
    raw = pako.inflate(combined);
  } catch (err) {
    throw new ImageFormatError(`PNG IDAT inflate failed: ${err instanceof Error ? err.message : String(err)}`);
  }
  const channels = CHANNELS[colorType]!;
  const rowBytes = Math.ceil((width * channels * bitDepth) / 8);
  if (raw.length < height * (1 + rowBytes)) throw new ImageFormatError("PNG IDAT too short");
  const bpp = Math.max(1, (channels * bitDepth) >> 3);
  const out = unfilter(raw, height, rowBytes, bpp);

  const rgba = new Uint8ClampedArray(width * height * 4);
  const grayScale = 255 / ((1 << bitDepth) - 1);
  for (let y = 0; y < height; y++) {
    const rowOff = y * rowBytes;
    for (let x = 0; x < width; x++) {
      const o = (y * width + x) * 4;
      if (colorType === 0) {
        const g = Math.round(sampleAt(out, rowOff, x, bitDepth) * grayScale);
        rgba[o] = g;
        rgba[o + 1] = g;
        rgba[o + 2] = g;
        rgba[o + 3] = 255;
      } else if (colorType === 3) {
        const idx = sampleAt(out, rowOff, x, bitDepth);
        if (!palette || idx * 3 + 2 >= palette.length) throw new ImageFormatError(`Palette index ${idx} out of range`);
        rgba[o] = palette[idx * 3]!;
        rgba[o + 1] = palette[idx * 3 + 1]!;
        rgba[o + 2] = palette[idx * 3 + 2]!;
        rgba[o + 3] = paletteAlpha && idx < paletteAlpha.length ? paletteAlpha[idx]! : 255;
      } else if (colorType === 4) {
        const g = out[rowOff + x * 2]!;
        rgba[o] = g;
        rgba[o + 1] = g;
        rgba[o + 2] = g;
        rgba[o + 3] = out[rowOff + x * 2 + 1]!;
      } else {
        const src = rowOff + x * channels;
        rgba[o] = out[src]!;
        rgba[o + 1] = out[src + 1]!;
        rgba[o + 2] = out[src + 2]!;
        rgba[o + 3] = channels === 4 ? out[src + 3]! : 255;
      }
    }
  }
  return { data: rgba, width, height };
}

/** ITU-R 601-2 luma of an RGB triple, 0..255. */
export function luma(r: number, g: number, b: number): number {
  return (r * 299 + g * 587 + b * 114) / 1000;
}

/** One bit per pixel: 1 where luma >= LUMA_THRESHOLD (light), 0 where dark. */
export function rgbaToGrid(image: RgbaImage): BinaryGrid {
  const { data, width, height } = image;
  const writer = new GridWriter(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      writer.set(x, y, luma(data[i]!, data[i + 1]!, data[i + 2]!) >= LUMA_THRESHOLD ? 1 : 0);
    }
  }
  return writer.toGrid();
}
