import { describe, it, expect } from "vitest";
import { BinaryGrid, GridWriter } from "../binary-grid";
import { InvalidSizeError, OutOfBoundsError } from "../errors";

describe("BinaryGrid", () => {
  it("fills every cell", () => {
    const grid = BinaryGrid.filled(3, 2, 1);
    expect(grid.width).toBe(3);
    expect(grid.height).toBe(2);
    expect(grid.countOn()).toBe(6);
    expect(grid.get(2, 1)).toBe(1);
  });

  it("defaults to off", () => {
    expect(BinaryGrid.filled(2, 2).countOn()).toBe(0);
  });

  it("allows empty grids", () => {
    const grid = BinaryGrid.filled(0, 0);
    expect(grid.toRows()).toEqual([]);
  });

  it("rejects negative or fractional dimensions", () => {
    expect(() => BinaryGrid.filled(-1, 2)).toThrow(InvalidSizeError);
    expect(() => BinaryGrid.filled(2, 1.5)).toThrow(InvalidSizeError);
    expect(() => new GridWriter(-2, 1)).toThrow(InvalidSizeError);
  });

  it("bounds-checks reads", () => {
    const grid = BinaryGrid.filled(3, 2);
    expect(() => grid.get(3, 0)).toThrow(OutOfBoundsError);
    expect(() => grid.get(0, 2)).toThrow(OutOfBoundsError);
    expect(() => grid.get(-1, 0)).toThrow(OutOfBoundsError);
    expect(() => grid.get(0.5, 0)).toThrow(OutOfBoundsError);
  });

  it("reports the offending cell", () => {
    const grid = BinaryGrid.filled(3, 2);
    expect(() => grid.get(4, 1)).toThrow("Cell (4, 1) outside 3x2 grid");
  });

  it("builds from rows, treating non-zero as on", () => {
    const grid = BinaryGrid.fromRows([
      [0, 2],
      [5, 0],
    ]);
    expect(grid.toRows()).toEqual([
      [0, 1],
      [1, 0],
    ]);
  });

  it("rejects ragged rows", () => {
    expect(() => BinaryGrid.fromRows([[1, 0], [1]])).toThrow(InvalidSizeError);
  });

  it("crops the top-left region", () => {
    const grid = BinaryGrid.fromRows([
      [1, 0, 1],
      [0, 1, 0],
    ]);
    expect(grid.crop(2, 1).toRows()).toEqual([[1, 0]]);
    expect(grid.crop(3, 2).equals(grid)).toBe(true);
    expect(() => grid.crop(4, 1)).toThrow(InvalidSizeError);
  });

  it("compares by size and content", () => {
    const a = BinaryGrid.fromRows([[1, 0]]);
    expect(a.equals(BinaryGrid.fromRows([[1, 0]]))).toBe(true);
    expect(a.equals(BinaryGrid.fromRows([[1, 1]]))).toBe(false);
    expect(a.equals(BinaryGrid.fromRows([[1], [0]]))).toBe(false);
  });
});

describe("GridWriter", () => {
  it("sets cells and hands over a grid", () => {
    const writer = new GridWriter(2, 2);
    writer.set(1, 0, 1);
    writer.set(0, 1, 1);
    expect(writer.toGrid().toRows()).toEqual([
      [0, 1],
      [1, 0],
    ]);
  });

  it("bounds-checks writes", () => {
    const writer = new GridWriter(2, 2);
    expect(() => writer.set(2, 0, 1)).toThrow(OutOfBoundsError);
    expect(() => writer.set(0, -1, 1)).toThrow(OutOfBoundsError);
  });

  it("is sealed once the grid is taken", () => {
    const writer = new GridWriter(1, 1);
    const grid = writer.toGrid();
    expect(() => writer.set(0, 0, 1)).toThrow("GridWriter already sealed");
    expect(() => writer.toGrid()).toThrow("GridWriter already sealed");
    expect(grid.get(0, 0)).toBe(0);
  });
});
