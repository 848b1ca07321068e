import { describe, it, expect } from "vitest";
import { InvalidSizeError } from "../errors";
import { binarize, parseSize, prepareMessage, resizeGray, toGrayscale } from "../prepare-message";
import type { RgbaImage } from "../types";

function plane(values: number[], width: number, height: number) {
  return { data: Float32Array.from(values), width, height };
}

function rgba(pixels: number[][], width: number, height: number): RgbaImage {
  return { data: new Uint8ClampedArray(pixels.flat()), width, height };
}

describe("parseSize", () => {
  it("reads WIDTH,HEIGHT with spaces", () => {
    expect(parseSize(" 4 , 3 ")).toEqual({ width: 4, height: 3 });
  });

  it("rejects malformed text", () => {
    expect(() => parseSize("4x3")).toThrow(InvalidSizeError);
    expect(() => parseSize("4,3,2")).toThrow(InvalidSizeError);
    expect(() => parseSize("-1,3")).toThrow(InvalidSizeError);
    expect(() => parseSize("")).toThrow(InvalidSizeError);
  });

  it("rejects zero dimensions", () => {
    expect(() => parseSize("0,3")).toThrow("Resize width should be > 0");
    expect(() => parseSize("4,0")).toThrow("Resize height should be > 0");
  });
});

describe("toGrayscale", () => {
  it("uses 601 luma and composites alpha over white", () => {
    const gray = toGrayscale(rgba([[255, 0, 0, 255], [0, 0, 0, 0], [0, 0, 0, 255]], 3, 1));
    expect(gray.data[0]).toBeCloseTo(76.245, 3);
    expect(gray.data[1]).toBe(255);
    expect(gray.data[2]).toBe(0);
  });
});

describe("resizeGray", () => {
  it("returns the plane untouched at the same size", () => {
    const p = plane([1, 2, 3, 4], 2, 2);
    expect(resizeGray(p, 2, 2)).toBe(p);
  });

  it("averages areas when shrinking", () => {
    const out = resizeGray(plane([0, 100, 200, 255], 4, 1), 2, 1);
    expect(out.width).toBe(2);
    expect(out.data[0]).toBeCloseTo(50, 4);
    expect(out.data[1]).toBeCloseTo(227.5, 4);
  });

  it("repeats pixels when enlarging", () => {
    const out = resizeGray(plane([80], 1, 1), 3, 2);
    expect(Array.from(out.data).map((v) => Math.round(v * 1000) / 1000)).toEqual([80, 80, 80, 80, 80, 80]);
  });

  it("rejects non-positive targets", () => {
    expect(() => resizeGray(plane([1], 1, 1), 0, 1)).toThrow(InvalidSizeError);
  });
});

describe("binarize", () => {
  it("thresholds at 128 without dithering", () => {
    expect(binarize(plane([127, 128, 0, 255], 4, 1), { dither: false }).toRows()).toEqual([[0, 1, 0, 1]]);
  });

  it("honours a custom threshold", () => {
    expect(binarize(plane([100, 200], 2, 1), { dither: false, threshold: 201 }).toRows()).toEqual([[0, 0]]);
  });

  it("diffuses error to the right", () => {
    // 100 -> off, 7/16 of the error (43.75) lifts the next pixel to 143.75
    expect(binarize(plane([100, 100], 2, 1)).toRows()).toEqual([[0, 1]]);
    expect(binarize(plane([100, 100], 2, 1), { dither: false }).toRows()).toEqual([[0, 0]]);
  });

  it("leaves pure black and white alone", () => {
    expect(binarize(plane([255, 0, 0, 255], 2, 2)).toRows()).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it("mixes on and off for mid gray", () => {
    const on = binarize(plane(new Array<number>(64).fill(127.5), 8, 8)).countOn();
    expect(on).toBeGreaterThan(0);
    expect(on).toBeLessThan(64);
  });
});

describe("prepareMessage", () => {
  const checker = rgba(
    [
      [255, 255, 255, 255],
      [0, 0, 0, 255],
      [0, 0, 0, 255],
      [255, 255, 255, 255],
    ],
    2,
    2
  );

  it("keeps the natural size", () => {
    expect(prepareMessage(checker, { width: 2, height: 2 }).toRows()).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it("resizes before binarizing", () => {
    // average luma 127.5 falls below the threshold
    expect(prepareMessage(checker, { width: 1, height: 1 }, { dither: false }).toRows()).toEqual([[0]]);
    expect(prepareMessage(checker, { width: 4, height: 2 }, { dither: false }).toRows()).toEqual([
      [1, 1, 0, 0],
      [0, 0, 1, 1],
    ]);
  });

  it("rejects non-positive sizes", () => {
    expect(() => prepareMessage(checker, { width: 0, height: 2 })).toThrow(InvalidSizeError);
  });
});
