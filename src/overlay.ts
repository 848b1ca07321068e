/**
 * Share composition and block inspection.
 */

import { BinaryGrid, GridWriter } from "./binary-grid";
import { SizeMismatchError } from "./errors";
import type { Bit, Block } from "./types";

function combine(a: BinaryGrid, b: BinaryGrid, op: (p: Bit, q: Bit) => Bit): BinaryGrid {
  if (a.width !== b.width || a.height !== b.height) {
    throw new SizeMismatchError(`Cannot combine ${a.width}x${a.height} with ${b.width}x${b.height}`);
  }
  const writer = new GridWriter(a.width, a.height);
  for (let y = 0; y < a.height; y++) {
    for (let x = 0; x < a.width; x++) {
      writer.set(x, y, op(a.get(x, y), b.get(x, y)));
    }
  }
  return writer.toGrid();
}

/** Cell-wise OR. */
export function overlay(a: BinaryGrid, b: BinaryGrid): BinaryGrid {
  return combine(a, b, (p, q) => (p === 1 || q === 1 ? 1 : 0));
}

/**
 * Cell-wise AND: two printed transparencies stacked, with bit 1 = white as
 * the PNG codec writes it. A cell stays white only where both are white.
 */
export function superimpose(a: BinaryGrid, b: BinaryGrid): BinaryGrid {
  return combine(a, b, (p, q) => (p === 1 && q === 1 ? 1 : 0));
}

export function blockAt(grid: BinaryGrid, mx: number, my: number): Block {
  const x = mx * 2;
  const y = my * 2;
  return [grid.get(x, y), grid.get(x + 1, y), grid.get(x, y + 1), grid.get(x + 1, y + 1)];
}

export function isBalancedBlock(block: Block): boolean {
  return block[0] + block[1] + block[2] + block[3] === 2;
}

export function isUniformBlock(block: Block, bit: Bit): boolean {
  return block.every((v) => v === bit);
}
