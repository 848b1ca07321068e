import { describe, it, expect } from "vitest";
import { BinaryGrid, GridWriter } from "../binary-grid";
import { generateCiphered } from "../cipher-encoder";
import { SizeMismatchError } from "../errors";
import { blockAt, isBalancedBlock, isUniformBlock, overlay, superimpose } from "../overlay";
import { seededRandomBits, sequenceBits } from "../random-bits";
import { generateSecret } from "../share-generator";

function randomMessage(width: number, height: number, seed: string): BinaryGrid {
  const bits = seededRandomBits(seed);
  const writer = new GridWriter(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) writer.set(x, y, bits.nextBit());
  }
  return writer.toGrid();
}

describe("generateCiphered", () => {
  it("matches the worked two-pixel case", () => {
    const message = BinaryGrid.fromRows([[1, 0]]);
    const secret = generateSecret({ width: 2, height: 1 }, null, sequenceBits([1, 0]));
    const ciphered = generateCiphered(secret, message);

    expect(blockAt(ciphered, 0, 0)).toEqual([1, 0, 0, 1]);
    expect(blockAt(ciphered, 1, 0)).toEqual([1, 0, 0, 1]);

    const stacked = overlay(secret, ciphered);
    expect(blockAt(stacked, 0, 0)).toEqual([1, 0, 0, 1]);
    expect(blockAt(stacked, 1, 0)).toEqual([1, 1, 1, 1]);
  });

  it("emits the complement of the secret block when bits disagree", () => {
    const message = BinaryGrid.fromRows([[0]]);
    const secret = generateSecret({ width: 1, height: 1 }, null, sequenceBits([1]));
    expect(blockAt(generateCiphered(secret, message), 0, 0)).toEqual([0, 1, 1, 0]);
  });

  it("copies the secret block where the message is on", () => {
    const message = BinaryGrid.filled(2, 2, 1);
    const secret = generateSecret({ width: 2, height: 2 }, null, sequenceBits([0, 1, 1, 0]));
    expect(generateCiphered(secret, message).equals(secret)).toBe(true);
  });

  it("keeps every ciphered block balanced", () => {
    const message = randomMessage(9, 7, "msg-balance");
    const secret = generateSecret({ width: 9, height: 7 }, null, seededRandomBits("key-balance"));
    const ciphered = generateCiphered(secret, message);
    for (let my = 0; my < 7; my++) {
      for (let mx = 0; mx < 9; mx++) {
        expect(isBalancedBlock(blockAt(ciphered, mx, my))).toBe(true);
      }
    }
  });

  it("reconstructs the message when overlaid", () => {
    const message = randomMessage(12, 10, "msg");
    const secret = generateSecret({ width: 12, height: 10 }, null, seededRandomBits("key"));
    const ciphered = generateCiphered(secret, message);
    const ored = overlay(secret, ciphered);
    const anded = superimpose(secret, ciphered);
    for (let my = 0; my < 10; my++) {
      for (let mx = 0; mx < 12; mx++) {
        if (message.get(mx, my) === 0) {
          expect(isUniformBlock(blockAt(ored, mx, my), 1)).toBe(true);
          expect(isUniformBlock(blockAt(anded, mx, my), 0)).toBe(true);
        } else {
          expect(blockAt(ored, mx, my)).toEqual(blockAt(secret, mx, my));
          expect(blockAt(anded, mx, my)).toEqual(blockAt(secret, mx, my));
        }
      }
    }
  });

  it("works on a secret cropped from an enlarged one", () => {
    const message = randomMessage(3, 2, "crop-msg");
    const canvas = generateSecret({ width: 6, height: 5 }, null, seededRandomBits("canvas"));
    const secret = generateSecret({ width: 3, height: 2 }, canvas, sequenceBits([]));
    const ciphered = generateCiphered(secret, message);
    expect(ciphered.width).toBe(6);
    expect(ciphered.height).toBe(4);
  });

  it("rejects a message of a different size", () => {
    const secret = generateSecret({ width: 2, height: 1 }, null, sequenceBits([1, 0]));
    expect(() => generateCiphered(secret, BinaryGrid.filled(1, 1))).toThrow(SizeMismatchError);
    expect(() => generateCiphered(secret, BinaryGrid.filled(2, 2))).toThrow(SizeMismatchError);
    expect(() => generateCiphered(secret, BinaryGrid.filled(4, 2))).toThrow(SizeMismatchError);
  });

  it("rejects a secret that is not block aligned", () => {
    expect(() => generateCiphered(BinaryGrid.filled(3, 2), BinaryGrid.filled(1, 1))).toThrow(SizeMismatchError);
  });
});
