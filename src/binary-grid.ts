/**
 * Rectangular grid of single-bit pixels, stored one byte per cell, row-major.
 * Grids are read-only; GridWriter builds them and is sealed by toGrid().
 */

import { InvalidSizeError, OutOfBoundsError } from "./errors";
import type { Bit } from "./types";

function checkDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidSizeError(`Grid ${name} must be a non-negative integer, got ${value}`);
  }
}

function cellIndex(x: number, y: number, width: number, height: number): number {
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= width || y >= height) {
    throw new OutOfBoundsError(x, y, width, height);
  }
  return y * width + x;
}

export class BinaryGrid {
  readonly width: number;
  readonly height: number;
  private readonly cells: Uint8Array;

  /** Takes ownership of cells; callers go through filled/fromRows/GridWriter. */
  private constructor(width: number, height: number, cells: Uint8Array) {
    this.width = width;
    this.height = height;
    this.cells = cells;
  }

  static filled(width: number, height: number, fill: Bit = 0): BinaryGrid {
    checkDimension("width", width);
    checkDimension("height", height);
    return new BinaryGrid(width, height, new Uint8Array(width * height).fill(fill));
  }

  /** Build from rows of bits; every row must have the same length. */
  static fromRows(rows: ReadonlyArray<ReadonlyArray<number>>): BinaryGrid {
    const height = rows.length;
    const width = height > 0 ? rows[0]!.length : 0;
    const writer = new GridWriter(width, height);
    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new InvalidSizeError(`Row ${y} has ${row.length} cells, expected ${width}`);
      }
      row.forEach((v, x) => writer.set(x, y, v !== 0 ? 1 : 0));
    });
    return writer.toGrid();
  }

  /** @internal used by GridWriter to hand over its buffer */
  static adopt(width: number, height: number, cells: Uint8Array): BinaryGrid {
    return new BinaryGrid(width, height, cells);
  }

  get(x: number, y: number): Bit {
    return this.cells[cellIndex(x, y, this.width, this.height)] === 1 ? 1 : 0;
  }

  /** Top-left region of the given size. */
  crop(width: number, height: number): BinaryGrid {
    checkDimension("width", width);
    checkDimension("height", height);
    if (width > this.width || height > this.height) {
      throw new InvalidSizeError(`Cannot crop ${this.width}x${this.height} grid to ${width}x${height}`);
    }
    const out = new Uint8Array(width * height);
    for (let y = 0; y < height; y++) {
      out.set(this.cells.subarray(y * this.width, y * this.width + width), y * width);
    }
    return new BinaryGrid(width, height, out);
  }

  countOn(): number {
    let n = 0;
    for (const c of this.cells) n += c;
    return n;
  }

  equals(other: BinaryGrid): boolean {
    if (other.width !== this.width || other.height !== this.height) return false;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false;
    }
    return true;
  }

  toRows(): Bit[][] {
    const rows: Bit[][] = [];
    for (let y = 0; y < this.height; y++) {
      const row: Bit[] = [];
      for (let x = 0; x < this.width; x++) row.push(this.get(x, y));
      rows.push(row);
    }
    return rows;
  }
}

/** Mutable builder for a BinaryGrid. */
export class GridWriter {
  readonly width: number;
  readonly height: number;
  private cells: Uint8Array | null;

  constructor(width: number, height: number, fill: Bit = 0) {
    checkDimension("width", width);
    checkDimension("height", height);
    this.width = width;
    this.height = height;
    this.cells = new Uint8Array(width * height).fill(fill);
  }

  set(x: number, y: number, bit: Bit): void {
    if (!this.cells) throw new Error("GridWriter already sealed");
    this.cells[cellIndex(x, y, this.width, this.height)] = bit;
  }

  toGrid(): BinaryGrid {
    if (!this.cells) throw new Error("GridWriter already sealed");
    const grid = BinaryGrid.adopt(this.width, this.height, this.cells);
    this.cells = null;
    return grid;
  }
}
