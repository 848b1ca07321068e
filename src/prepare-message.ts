/**
 * Message preparation: RGBA -> grayscale -> resized -> one bit per pixel.
 * Light pixels become 1, dark pixels 0, the same convention rgbaToGrid uses.
 */

import { BinaryGrid, GridWriter } from "./binary-grid";
import { InvalidSizeError } from "./errors";
import { LUMA_THRESHOLD, luma } from "./png-decode";
import { checkTargetSize } from "./share-generator";
import type { GridSize, PrepareOptions, RgbaImage } from "./types";

export interface GrayPlane {
  data: Float32Array;
  width: number;
  height: number;
}

/** Luma plane; alpha is composited over white. */
export function toGrayscale(image: RgbaImage): GrayPlane {
  const { data, width, height } = image;
  const out = new Float32Array(width * height);
  for (let i = 0; i < out.length; i++) {
    const o = i * 4;
    const alpha = data[o + 3]! / 255;
    const l = luma(data[o]!, data[o + 1]!, data[o + 2]!);
    out[i] = l * alpha + 255 * (1 - alpha);
  }
  return { data: out, width, height };
}

/** Area-average weights mapping n source samples onto m output samples. */
function boxWeights(n: number, m: number): Array<Array<[number, number]>> {
  const scale = n / m;
  const weights: Array<Array<[number, number]>> = [];
  for (let i = 0; i < m; i++) {
    const start = i * scale;
    const end = (i + 1) * scale;
    const taps: Array<[number, number]> = [];
    for (let j = Math.floor(start); j < Math.min(n, Math.ceil(end)); j++) {
      const overlap = Math.min(end, j + 1) - Math.max(start, j);
      if (overlap > 0) taps.push([j, overlap / scale]);
    }
    weights.push(taps);
  }
  return weights;
}

/** Box-filter resample; returns the input when the size already matches. */
export function resizeGray(plane: GrayPlane, width: number, height: number): GrayPlane {
  checkTargetSize({ width, height });
  if (plane.width === width && plane.height === height) return plane;
  if (plane.width === 0 || plane.height === 0) {
    throw new InvalidSizeError(`Cannot resize an empty ${plane.width}x${plane.height} image`);
  }
  const xw = boxWeights(plane.width, width);
  const yw = boxWeights(plane.height, height);

  const horiz = new Float32Array(width * plane.height);
  for (let y = 0; y < plane.height; y++) {
    for (let x = 0; x < width; x++) {
      let sum = 0;
      for (const [sx, w] of xw[x]!) sum += plane.data[y * plane.width + sx]! * w;
      horiz[y * width + x] = sum;
    }
  }
  const out = new Float32Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let sum = 0;
      for (const [sy, w] of yw[y]!) sum += horiz[sy * width + x]! * w;
      out[y * width + x] = sum;
    }
  }
  return { data: out, width, height };
}

/** One bit per pixel; Floyd-Steinberg error diffusion unless dither is false. */
export function binarize(plane: GrayPlane, options: PrepareOptions = {}): BinaryGrid {
  const dither = options.dither ?? true;
  const threshold = options.threshold ?? LUMA_THRESHOLD;
  const { width, height } = plane;
  const work = Float32Array.from(plane.data);
  const writer = new GridWriter(width, height);
  const spread = (x: number, y: number, amount: number): void => {
    if (x >= 0 && x < width && y < height) work[y * width + x] = work[y * width + x]! + amount;
  };
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const old = work[y * width + x]!;
      const on = old >= threshold;
      writer.set(x, y, on ? 1 : 0);
      if (!dither) continue;
      const err = old - (on ? 255 : 0);
      spread(x + 1, y, (err * 7) / 16);
      spread(x - 1, y + 1, (err * 3) / 16);
      spread(x, y + 1, (err * 5) / 16);
      spread(x + 1, y + 1, err / 16);
    }
  }
  return writer.toGrid();
}

export function prepareMessage(image: RgbaImage, size: GridSize, options: PrepareOptions = {}): BinaryGrid {
  checkTargetSize(size);
  return binarize(resizeGray(toGrayscale(image), size.width, size.height), options);
}

/** Parse "W,H" into a size; whitespace around either number is allowed. */
export function parseSize(text: string): GridSize {
  const parts = text.trim().split(",").map((p) => p.trim());
  if (parts.length !== 2 || parts.some((p) => !/^\d+$/.test(p))) {
    throw new InvalidSizeError(`Invalid size "${text}", expected WIDTH,HEIGHT`);
  }
  const width = Number(parts[0]);
  const height = Number(parts[1]);
  if (width <= 0) throw new InvalidSizeError("Resize width should be > 0");
  if (height <= 0) throw new InvalidSizeError("Resize height should be > 0");
  return { width, height };
}
