// Single sub-pixel value; 1 = "on"
export type Bit = 0 | 1;

export interface GridSize {
  width: number;
  height: number;
}

/** Decoded image, 8-bit RGBA, row-major. */
export interface RgbaImage {
  data: Uint8ClampedArray;
  width: number;
  height: number;
}

/** Injected source of key bits for new secret blocks. */
export interface RandomBitSource {
  nextBit(): Bit;
}

/** The four sub-pixels of one block: top-left, top-right, bottom-left, bottom-right. */
export type Block = [Bit, Bit, Bit, Bit];

export type PrepareOptions = {
  /** Floyd-Steinberg error diffusion; plain threshold when false. Defaults to true. */
  dither?: boolean;
  threshold?: number;
};

export type EncodeOptions = {
  messagePath: string;
  secretPath: string;
  cipheredPath: string;
  resize?: GridSize;
  preparedPath?: string;
  /** Where to write the superimposed preview of both shares. */
  stackedPath?: string;
  dither?: boolean;
};

export type EncodeResult = {
  size: GridSize;
  secretSize: GridSize;
  secretCreated: boolean;
  secretEnlarged: boolean;
  written: string[];
};
