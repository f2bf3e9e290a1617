/**
 * TLV stream encoding and decoding.
 *
 * Stream Structure:
 * ┌──────────────┬────────────────┬──────────────┬─────┐
 * │ type         │ length         │ value        │ ... │
 * │ (BigSize)    │ (BigSize)      │ (length B)   │     │
 * └──────────────┴────────────────┴──────────────┴─────┘
 *
 * There is no header, trailer or record count: running out of input at a
 * record boundary ends the stream. Types are strictly increasing.
 */

import { getLogger } from "@logtape/logtape"
import { bigSizeLength, readBigSize, writeBigSize } from "./big-size.js"
import { type ReaderOptions, WireReader, WireWriter } from "./cursor.js"
import { attemptDecode, type DecodeResult } from "./decode-result.js"
import { DecodeError } from "./errors.js"
import { type KnownTypeEntry, KnownTypeTable } from "./known-types.js"
import { rawValueLength, readRawValue, writeRawValue } from "./raw-value.js"
import { TlvStream } from "./stream.js"
import { isEven, type TlvType } from "./tlv-type.js"

const logger = getLogger(["@peerwire", "tlv"])

/**
 * How a decoded stream is checked against the consumer's known types.
 */
export interface StreamPolicy {
  /** Types the consumer understands */
  knownTypes?: KnownTypeTable | Iterable<KnownTypeEntry>
  /**
   * Reject unknown even types (default: true when `knownTypes` is given).
   * Without a table every type counts as unknown.
   */
  enforceEvenOdd?: boolean
}

export type StreamDecodeOptions = ReaderOptions & StreamPolicy

/** Encoded size of the stream in bytes */
export function streamLength(stream: TlvStream): number {
  let length = 0
  for (const [type, value] of stream) {
    length += bigSizeLength(type) + rawValueLength(value)
  }
  return length
}

/**
 * Write every record in ascending type order. An empty stream writes nothing.
 */
export function writeStream(writer: WireWriter, stream: TlvStream): void {
  for (const [type, value] of stream) {
    writeBigSize(writer, type)
    writeRawValue(writer, value)
  }
}

export function encodeStream(stream: TlvStream): Uint8Array {
  if (stream.isEmpty) {
    return new Uint8Array(0)
  }
  const writer = new WireWriter(streamLength(stream))
  writeStream(writer, stream)
  return writer.bytes()
}

/**
 * Read records until the input is exhausted, then apply `policy`.
 *
 * @throws DecodeError `out_of_order_type` / `duplicate_type` when types are
 *   not strictly increasing, plus anything `validateStream` throws
 */
export function readStream(
  reader: WireReader,
  policy: StreamPolicy = {},
): TlvStream {
  const stream = new TlvStream()
  let previous: TlvType | undefined

  while (reader.hasMore) {
    const type = readBigSize(reader)

    if (previous !== undefined && type <= previous) {
      if (type === previous) {
        throw new DecodeError(
          "duplicate_type",
          `TLV type ${type} repeated`,
          { type },
        )
      }
      throw new DecodeError(
        "out_of_order_type",
        `TLV type ${type} read after ${previous}`,
        { type },
      )
    }

    stream.insert(type, readRawValue(reader))
    previous = type
  }

  const enforce = policy.enforceEvenOdd ?? policy.knownTypes !== undefined
  if (enforce) {
    validateStream(stream, policy.knownTypes ?? new KnownTypeTable())
  }
  return stream
}

/**
 * Decode a complete buffer as one TLV stream.
 */
export function decodeStream(
  bytes: Uint8Array,
  options: StreamDecodeOptions = {},
): TlvStream {
  return readStream(new WireReader(bytes, options), options)
}

/**
 * Decode a buffer that may not hold the whole stream yet.
 */
export function tryDecodeStream(
  bytes: Uint8Array,
  options: StreamDecodeOptions = {},
): DecodeResult<TlvStream> {
  return attemptDecode(bytes, reader => readStream(reader, options), options)
}

/**
 * Apply the even/odd rule to a decoded stream.
 *
 * Known types are passed to their validator. Unknown even types reject the
 * whole stream; unknown odd types stay in the stream for the application.
 *
 * @returns the unknown odd types that were retained
 * @throws DecodeError `unknown_even_type` or whatever a validator throws
 */
export function validateStream(
  stream: TlvStream,
  knownTypes: KnownTypeTable | Iterable<KnownTypeEntry>,
): TlvType[] {
  const table = KnownTypeTable.from(knownTypes)
  const retained: TlvType[] = []

  for (const [type, value] of stream) {
    if (table.has(type)) {
      table.validate(type, value)
    } else if (isEven(type)) {
      throw new DecodeError(
        "unknown_even_type",
        `Unknown even TLV type ${type}`,
        { type },
      )
    } else {
      retained.push(type)
    }
  }

  if (retained.length > 0) {
    logger.trace("retaining unknown odd TLV types {types}", {
      types: retained.map(String),
    })
  }
  return retained
}
