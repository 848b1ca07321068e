/**
 * Error kinds raised by the share core, the PNG codec and the encode pipeline.
 */

export type ShareGridErrorKind = "InvalidSize" | "MalformedShare" | "SizeMismatch" | "OutOfBounds";

export class ShareGridError extends Error {
  readonly kind: ShareGridErrorKind;

  constructor(kind: ShareGridErrorKind, message: string) {
    super(message);
    this.name = `${kind}Error`;
    this.kind = kind;
  }
}

export class InvalidSizeError extends ShareGridError {
  constructor(message: string) {
    super("InvalidSize", message);
  }
}

export class MalformedShareError extends ShareGridError {
  constructor(message: string) {
    super("MalformedShare", message);
  }
}

export class SizeMismatchError extends ShareGridError {
  constructor(message: string) {
    super("SizeMismatch", message);
  }
}

export class OutOfBoundsError extends ShareGridError {
  constructor(x: number, y: number, width: number, height: number) {
    super("OutOfBounds", `Cell (${x}, ${y}) outside ${width}x${height} grid`);
  }
}

export class ImageFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImageFormatError";
  }
}

/** Fatal pipeline failure; exitCode is what the CLI exits with. */
export class PipelineError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.exitCode = exitCode;
  }
}
