export type { Decoded } from "./decode.js";
export {
  COUNT_BYTES,
  ENTRY_BYTES,
  HEADER_BYTES,
  RANDOM3D_RECORD_BYTES,
  decodeExhaustive,
  decodeRandom2D,
  decodeRandom3D,
  decodeResult,
  readHeader,
  readResultFile,
} from "./decode.js";
export { encodeExhaustive, encodeRandom2D, encodeRandom3D } from "./encode.js";
