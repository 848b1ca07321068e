/**
 * Secret share generation.
 *
 * Each message pixel maps to a 2x2 block holding one key bit b:
 *
 *   b    1-b
 *   1-b  b
 *
 * Every block has two "on" and two "off" sub-pixels whatever b is, so a share
 * on its own carries no information. Blocks already present in an existing
 * secret keep their key bit; only newly covered blocks draw fresh bits.
 */

import { BinaryGrid, GridWriter } from "./binary-grid";
import { InvalidSizeError, MalformedShareError } from "./errors";
import { cryptoRandomBits } from "./random-bits";
import type { Bit, GridSize, RandomBitSource } from "./types";

/** Write the secret block for key bit `bit` at message position (mx, my). */
export function writeSecretBlock(writer: GridWriter, mx: number, my: number, bit: Bit): void {
  const x = mx * 2;
  const y = my * 2;
  const inv: Bit = bit === 1 ? 0 : 1;
  writer.set(x, y, bit);
  writer.set(x + 1, y, inv);
  writer.set(x, y + 1, inv);
  writer.set(x + 1, y + 1, bit);
}

/** Key bit of the block at message position (mx, my): its top-left sub-pixel. */
export function secretKeyBit(secret: BinaryGrid, mx: number, my: number): Bit {
  return secret.get(mx * 2, my * 2);
}

/** Size of a share in message-pixel units. Throws MalformedShare on odd dimensions. */
export function shareMessageSize(share: BinaryGrid): GridSize {
  if (share.width % 2 !== 0 || share.height % 2 !== 0) {
    throw new MalformedShareError(
      `Share size ${share.width}x${share.height} is not a doubling of whole message dimensions`
    );
  }
  return { width: share.width / 2, height: share.height / 2 };
}

export function checkTargetSize(size: GridSize): void {
  const { width, height } = size;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidSizeError(`Target size must be positive integers, got ${width}x${height}`);
  }
}

/**
 * Build a secret share of size (2*width)x(2*height), reusing the key bits of
 * `existing` where the regions overlap. Fresh bits are drawn row by row
 * (y outer, x inner) for positions outside `existing`.
 */
export function generateSecret(
  size: GridSize,
  existing?: BinaryGrid | null,
  random: RandomBitSource = cryptoRandomBits()
): BinaryGrid {
  checkTargetSize(size);
  const old = existing ? shareMessageSize(existing) : { width: 0, height: 0 };
  const writer = new GridWriter(size.width * 2, size.height * 2);
  for (let my = 0; my < size.height; my++) {
    for (let mx = 0; mx < size.width; mx++) {
      const bit =
        existing && mx < old.width && my < old.height ? secretKeyBit(existing, mx, my) : random.nextBit();
      writeSecretBlock(writer, mx, my, bit);
    }
  }
  return writer.toGrid();
}
