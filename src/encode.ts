/**
 * Encode pipeline: load message and secret, enlarge or create the secret as
 * needed, build the ciphered share and write everything back.
 *
 * The secret on disk only ever grows: when the requested size exceeds it in
 * either dimension it is enlarged to cover both, keeping every existing block.
 * The ciphered share uses the top-left region of that canvas.
 */

import type { BinaryGrid } from "./binary-grid";
import { generateCiphered } from "./cipher-encoder";
import { EXIT_CIPHERED_SAVE, EXIT_MESSAGE_LOAD, EXIT_SECRET_LOAD } from "./constants";
import { PipelineError } from "./errors";
import { fileExists, readGrid, readImage, writeGrid } from "./image-io";
import { logAction, logDebug, logError, logInfo } from "./logger";
import { superimpose } from "./overlay";
import { prepareMessage } from "./prepare-message";
import { cryptoRandomBits } from "./random-bits";
import { generateSecret, shareMessageSize } from "./share-generator";
import type { EncodeOptions, EncodeResult, GridSize, RandomBitSource, RgbaImage } from "./types";

async function loadMessage(path: string): Promise<RgbaImage> {
  logDebug(`Loading message image '${path}'`);
  try {
    const image = await readImage(path);
    logAction("message_loaded", "Message image loaded", { path, width: image.width, height: image.height });
    return image;
  } catch (err) {
    throw new PipelineError(`I/O error while loading message image '${path}'`, EXIT_MESSAGE_LOAD, { cause: err });
  }
}

async function loadSecret(path: string): Promise<BinaryGrid> {
  logDebug(`Loading secret image '${path}'`);
  try {
    const secret = await readGrid(path);
    shareMessageSize(secret);
    logAction("secret_loaded", "Secret image loaded", { path, width: secret.width, height: secret.height });
    return secret;
  } catch (err) {
    throw new PipelineError(`Error while loading secret image '${path}'`, EXIT_SECRET_LOAD, { cause: err });
  }
}

/** Save a non-essential output; failures are logged, not thrown. */
async function saveOptional(path: string, grid: BinaryGrid, what: string, written: string[]): Promise<void> {
  logDebug(`Saving ${what} '${path}'`);
  try {
    await writeGrid(path, grid);
    written.push(path);
    logAction("file_saved", `Saved ${what}`, { path });
  } catch (err) {
    logError(`I/O error while saving ${what} '${path}'`, err);
  }
}

export async function runEncode(
  options: EncodeOptions,
  random: RandomBitSource = cryptoRandomBits()
): Promise<EncodeResult> {
  const messageImage = await loadMessage(options.messagePath);
  const size: GridSize = options.resize ?? { width: messageImage.width, height: messageImage.height };

  let canvas: BinaryGrid;
  let secretCreated = false;
  let secretEnlarged = false;
  if (await fileExists(options.secretPath)) {
    const existing = await loadSecret(options.secretPath);
    const old = shareMessageSize(existing);
    if (old.width < size.width || old.height < size.height) {
      const grown = { width: Math.max(old.width, size.width), height: Math.max(old.height, size.height) };
      logInfo("Enlarging secret image to fit message size", { from: old, to: grown });
      canvas = generateSecret(grown, existing, random);
      secretEnlarged = true;
      logAction("secret_enlarged", "Secret enlarged", { width: grown.width, height: grown.height });
    } else {
      canvas = existing;
    }
  } else {
    logInfo(`Generating secret image '${options.secretPath}'`);
    canvas = generateSecret(size, null, random);
    secretCreated = true;
    logAction("secret_generated", "Secret generated", { width: size.width, height: size.height });
  }

  const prepared = prepareMessage(messageImage, size, { dither: options.dither });
  logAction("message_prepared", "Message prepared", { width: size.width, height: size.height, on: prepared.countOn() });

  const secret = generateSecret(size, canvas, random);
  const ciphered = generateCiphered(secret, prepared);
  logAction("ciphered_generated", "Ciphered share generated", { width: ciphered.width, height: ciphered.height });

  const written: string[] = [];
  if (secretCreated || secretEnlarged) {
    await saveOptional(options.secretPath, canvas, "secret image", written);
  }
  if (options.preparedPath) {
    await saveOptional(options.preparedPath, prepared, "prepared message image", written);
  }

  logDebug(`Saving ciphered image '${options.cipheredPath}'`);
  try {
    await writeGrid(options.cipheredPath, ciphered);
  } catch (err) {
    throw new PipelineError(`I/O error while saving ciphered image '${options.cipheredPath}'`, EXIT_CIPHERED_SAVE, {
      cause: err,
    });
  }
  written.push(options.cipheredPath);
  logAction("file_saved", "Saved ciphered image", { path: options.cipheredPath });

  if (options.stackedPath) {
    await saveOptional(options.stackedPath, superimpose(secret, ciphered), "stacked preview", written);
  }

  return {
    size,
    secretSize: shareMessageSize(canvas),
    secretCreated,
    secretEnlarged,
    written,
  };
}
