export { BinaryGrid, GridWriter } from "./binary-grid";
export { generateSecret, writeSecretBlock, secretKeyBit, shareMessageSize } from "./share-generator";
export { generateCiphered } from "./cipher-encoder";
export { overlay, superimpose, blockAt, isBalancedBlock, isUniformBlock } from "./overlay";
export { cryptoRandomBits, seededRandomBits, sequenceBits } from "./random-bits";
export { decodePngToRGBA, rgbaToGrid } from "./png-decode";
export { encodeGridToPNG } from "./png-encode";
export { prepareMessage, parseSize, binarize, resizeGray, toGrayscale } from "./prepare-message";
export { runEncode } from "./encode";
export {
  ShareGridError,
  InvalidSizeError,
  MalformedShareError,
  SizeMismatchError,
  OutOfBoundsError,
  ImageFormatError,
  PipelineError,
} from "./errors";
export type { Bit, Block, GridSize, RgbaImage, RandomBitSource, EncodeOptions, EncodeResult, PrepareOptions } from "./types";
