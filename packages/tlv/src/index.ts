/**
 * @peerwire/tlv
 *
 * Type-Length-Value streams for the peer-to-peer wire protocol:
 *
 * - BigSize canonical variable-length integers
 * - `TlvStream`, an ordered set of records keyed by type
 * - Stream decoding with strict ordering, length guards and the even/odd rule
 * - Three-way decode results that tell "need more bytes" from "invalid bytes"
 *
 * @example
 * ```typescript
 * import { decodeStream, encodeStream, TlvStream } from "@peerwire/tlv"
 *
 * const stream = TlvStream.from([[1, new Uint8Array([0xaa])]])
 * const bytes = encodeStream(stream) // 01 01 aa
 *
 * // Type 1 is understood; an unknown even type would be rejected
 * const decoded = decodeStream(bytes, { knownTypes: [1] })
 * ```
 */

// BigSize
export {
  bigSizeLength,
  encodeBigSize,
  readBigSize,
  writeBigSize,
} from "./big-size.js"
// Constants
export {
  BigSizeMinimum,
  BigSizePrefix,
  DEFAULT_MAX_RECORD_LENGTH,
  MAX_U64,
} from "./constants.js"
// Cursors
export { type ReaderOptions, WireReader, WireWriter } from "./cursor.js"
// Three-way results
export { attemptDecode, type DecodeResult } from "./decode-result.js"
// Errors
export {
  DecodeError,
  type DecodeErrorCode,
  type DecodeErrorDetails,
  EncodeError,
  type EncodeErrorCode,
} from "./errors.js"
// Known types
export {
  type KnownTypeEntry,
  KnownTypeTable,
  type RecordValidator,
} from "./known-types.js"
// Raw values
export { rawValueLength, readRawValue, writeRawValue } from "./raw-value.js"
// Streams
export { TlvStream } from "./stream.js"
export {
  decodeStream,
  encodeStream,
  readStream,
  type StreamDecodeOptions,
  type StreamPolicy,
  streamLength,
  tryDecodeStream,
  validateStream,
  writeStream,
} from "./stream-codec.js"
// TLV types
export {
  compareTlvTypes,
  isEven,
  isOdd,
  type TlvType,
  toTlvType,
} from "./tlv-type.js"
