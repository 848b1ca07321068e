/**
 * Load and save images and share grids as PNG files.
 */

import { access, readFile, writeFile } from "node:fs/promises";
import type { BinaryGrid } from "./binary-grid";
import { encodeGridToPNG } from "./png-encode";
import { decodePngToRGBA, rgbaToGrid } from "./png-decode";
import type { RgbaImage } from "./types";

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function readImage(path: string): Promise<RgbaImage> {
  const bytes = await readFile(path);
  return decodePngToRGBA(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength));
}

export async function readGrid(path: string): Promise<BinaryGrid> {
  return rgbaToGrid(await readImage(path));
}

export async function writeGrid(path: string, grid: BinaryGrid): Promise<void> {
  await writeFile(path, encodeGridToPNG(grid));
}
