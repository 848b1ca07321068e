/**
 * Command-line front end for the encode pipeline.
 */

import { Command, InvalidArgumentError } from "commander";
import { DEFAULT_CIPHERED_PATH, DEFAULT_SECRET_PATH, VERSION } from "./constants";
import { runEncode } from "./encode";
import { InvalidSizeError, PipelineError } from "./errors";
import { levelForVerbosity, logFatal, logInfo, setLogLevel } from "./logger";
import { parseSize } from "./prepare-message";
import { cryptoRandomBits, seededRandomBits } from "./random-bits";
import type { GridSize } from "./types";

export type CliOptions = {
  message: string;
  secret: string;
  ciphered: string;
  resize?: GridSize;
  preparedMessage?: string;
  stacked?: string;
  seed?: string;
  dither: boolean;
  verbose: number;
};

function parseResize(value: string): GridSize {
  try {
    return parseSize(value);
  } catch (err) {
    if (err instanceof InvalidSizeError) throw new InvalidArgumentError(err.message);
    throw err;
  }
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("sharegrid")
    .description("Visual cipher image generator: splits a black/white message into two noise-like shares.")
    .version(VERSION)
    .requiredOption("-m, --message <path>", "message image")
    .option("-s, --secret <path>", "secret image (created if it does not exist)", DEFAULT_SECRET_PATH)
    .option("-c, --ciphered <path>", "ciphered image (to be generated)", DEFAULT_CIPHERED_PATH)
    .option(
      "-r, --resize <WIDTH,HEIGHT>",
      "resize message image (defaults to message image size); the secret image is enlarged when needed",
      parseResize
    )
    .option("-p, --prepared-message <path>", "save the prepared (resized, binarized) message image here")
    .option("--stacked <path>", "save a preview of both shares stacked on top of each other")
    .option("--seed <text>", "derive new secret bits from this seed instead of the system random source")
    .option("--no-dither", "binarize the message with a plain threshold")
    .option("-v, --verbose", "increase log output (repeatable)", increaseVerbosity, 0);
  return program;
}

/** Parse argv and run the pipeline. Resolves to the process exit code. */
export async function runCli(argv: string[]): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const opts = program.opts<CliOptions>();
  setLogLevel(levelForVerbosity(opts.verbose));
  logInfo(`Cipher image generator version ${VERSION}`);

  try {
    await runEncode(
      {
        messagePath: opts.message,
        secretPath: opts.secret,
        cipheredPath: opts.ciphered,
        resize: opts.resize,
        preparedPath: opts.preparedMessage,
        stackedPath: opts.stacked,
        dither: opts.dither,
      },
      opts.seed !== undefined ? seededRandomBits(opts.seed) : cryptoRandomBits()
    );
    return 0;
  } catch (err) {
    if (err instanceof PipelineError) {
      logFatal(`Fatal error: ${err.message}`, err.cause ?? err);
      return err.exitCode;
    }
    throw err;
  }
}
