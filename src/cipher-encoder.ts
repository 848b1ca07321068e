/**
 * Ciphered share: per block, the secret's own pattern or its complement,
 * chosen from the message bit and the secret's key bit.
 */

import { BinaryGrid, GridWriter } from "./binary-grid";
import { SizeMismatchError } from "./errors";
import { secretKeyBit, shareMessageSize, writeSecretBlock } from "./share-generator";
import type { Bit } from "./types";

export function generateCiphered(secret: BinaryGrid, message: BinaryGrid): BinaryGrid {
  if (secret.width % 2 !== 0 || secret.height % 2 !== 0) {
    throw new SizeMismatchError(`Secret size ${secret.width}x${secret.height} is not block aligned`);
  }
  const blocks = shareMessageSize(secret);
  if (blocks.width !== message.width || blocks.height !== message.height) {
    throw new SizeMismatchError(
      `Secret covers ${blocks.width}x${blocks.height} message pixels, message is ${message.width}x${message.height}`
    );
  }
  const writer = new GridWriter(secret.width, secret.height);
  for (let my = 0; my < message.height; my++) {
    for (let mx = 0; mx < message.width; mx++) {
      const s = secretKeyBit(secret, mx, my);
      const m = message.get(mx, my);
      const agree = (m !== 0) === (s !== 0);
      const color: Bit = agree ? 0 : 1;
      // TL = 1-color, TR = color, BL = color, BR = 1-color: the secret pattern for key bit 1-color
      writeSecretBlock(writer, mx, my, color === 1 ? 0 : 1);
    }
  }
  return writer.toGrid();
}
