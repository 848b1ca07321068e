/**
 * Random bit sources for secret-share key bits.
 * Bits are taken MSB first from each byte.
 */

import { webcrypto } from "node:crypto";
import { sha256 } from "@noble/hashes/sha2.js";
import type { Bit, RandomBitSource } from "./types";

const CRYPTO_CHUNK = 256;

/** Pulls bits from a byte producer, refilling when the current chunk runs out. */
class ByteBitReader implements RandomBitSource {
  private bytes: Uint8Array = new Uint8Array(0);
  private bitPos = 0;

  constructor(private readonly refill: () => Uint8Array) {}

  nextBit(): Bit {
    if (this.bitPos >= this.bytes.length * 8) {
      this.bytes = this.refill();
      this.bitPos = 0;
    }
    const byte = this.bytes[this.bitPos >> 3]!;
    const bit = (byte >> (7 - (this.bitPos & 7))) & 1;
    this.bitPos++;
    return bit === 1 ? 1 : 0;
  }
}

export function cryptoRandomBits(): RandomBitSource {
  return new ByteBitReader(() => webcrypto.getRandomValues(new Uint8Array(CRYPTO_CHUNK)));
}

/** Deterministic stream: sha256(`${seed}:${counter}`) for counter = 0, 1, 2, ... */
export function seededRandomBits(seed: string): RandomBitSource {
  const encoder = new TextEncoder();
  let counter = 0;
  return new ByteBitReader(() => sha256(encoder.encode(`${seed}:${counter++}`)));
}

/** Replays a fixed list of bits. */
export function sequenceBits(bits: ReadonlyArray<number>): RandomBitSource {
  let i = 0;
  return {
    nextBit(): Bit {
      if (i >= bits.length) throw new RangeError(`Bit sequence exhausted after ${bits.length} bits`);
      return bits[i++] !== 0 ? 1 : 0;
    },
  };
}
