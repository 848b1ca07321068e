/**
 * Minimal raw PNG encoder for share grids.
 * Writes 1-bit grayscale: bit 1 -> white, bit 0 -> black.
 */

import pako from "pako";
import type { BinaryGrid } from "./binary-grid";
import { ImageFormatError } from "./errors";

/** CRC32 lookup table */
const crcTable = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c;
  }
  return table;
})();

export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (let i = 0; i < data.length; i++) {
    crc = crcTable[(crc ^ data[i]!) & 0xff]! ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function writeU32BE(arr: Uint8Array, offset: number, value: number): void {
  arr[offset] = (value >>> 24) & 0xff;
  arr[offset + 1] = (value >>> 16) & 0xff;
  arr[offset + 2] = (value >>> 8) & 0xff;
  arr[offset + 3] = value & 0xff;
}

export function makeChunk(type: string, data: Uint8Array): Uint8Array {
  const chunk = new Uint8Array(4 + 4 + data.length + 4);
  writeU32BE(chunk, 0, data.length);
  chunk[4] = type.charCodeAt(0);
  chunk[5] = type.charCodeAt(1);
  chunk[6] = type.charCodeAt(2);
  chunk[7] = type.charCodeAt(3);
  chunk.set(data, 8);
  const crcData = chunk.subarray(4, 8 + data.length);
  writeU32BE(chunk, 8 + data.length, crc32(crcData));
  return chunk;
}

/** Assemble signature + IHDR + IDAT (deflated scanlines) + IEND. */
export function assemblePng(
  width: number,
  height: number,
  bitDepth: number,
  colorType: number,
  filtered: Uint8Array
): Uint8Array {
  const sig = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

  const ihdr = new Uint8Array(13);
  writeU32BE(ihdr, 0, width);
  writeU32BE(ihdr, 4, height);
  ihdr[8] = bitDepth;
  ihdr[9] = colorType;
  ihdr[10] = 0; // compression
  ihdr[11] = 0; // filter
  ihdr[12] = 0; // interlace
  const ihdrChunk = makeChunk("IHDR", ihdr);
  const idatChunk = makeChunk("IDAT", pako.deflate(filtered, { level: 9 }));
  const iendChunk = makeChunk("IEND", new Uint8Array(0));

  const png = new Uint8Array(sig.length + ihdrChunk.length + idatChunk.length + iendChunk.length);
  let off = 0;
  png.set(sig, off); off += sig.length;
  png.set(ihdrChunk, off); off += ihdrChunk.length;
  png.set(idatChunk, off); off += idatChunk.length;
  png.set(iendChunk, off);
  return png;
}

/**
 * Encode a grid as a 1-bit grayscale PNG. Rows are packed MSB first,
 * filter type 0 on every row.
 */
export function encodeGridToPNG(grid: BinaryGrid): Uint8Array {
  const { width, height } = grid;
  if (width === 0 || height === 0) {
    throw new ImageFormatError(`Cannot write an empty ${width}x${height} image`);
  }
  const rowBytes = Math.ceil(width / 8);
  const filtered = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    const rowOff = y * (1 + rowBytes) + 1;
    for (let x = 0; x < width; x++) {
      if (grid.get(x, y) === 1) {
        const i = rowOff + (x >> 3);
        filtered[i] = filtered[i]! | (0x80 >> (x & 7));
      }
    }
  }
  return assemblePng(width, height, 1, 0, filtered);
}
