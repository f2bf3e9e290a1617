/**
 * Field codecs for message payloads.
 *
 * A payload is a sequence of fields read and written in a fixed order.
 * Length-prefixed fields (`bytes`, `string`, `list`) use a BigSize prefix
 * and check the declared length against the reader's maximum record length
 * before allocating anything.
 */

import {
  DecodeError,
  EncodeError,
  readBigSize,
  type WireReader,
  type WireWriter,
  writeBigSize,
} from "@peerwire/tlv"

/**
 * Encoder and decoder for one payload field (or a whole payload).
 */
export interface PayloadCodec<T> {
  encode(writer: WireWriter, value: T): void
  decode(reader: WireReader): T
}

const textEncoder = new TextEncoder()
const textDecoder = new TextDecoder("utf-8", { fatal: true })

const u8: PayloadCodec<number> = {
  encode: (writer, value) => writer.writeU8(value),
  decode: reader => reader.readU8(),
}

const u16: PayloadCodec<number> = {
  encode: (writer, value) => writer.writeU16(value),
  decode: reader => reader.readU16(),
}

const u32: PayloadCodec<number> = {
  encode: (writer, value) => writer.writeU32(value),
  decode: reader => reader.readU32(),
}

const u64: PayloadCodec<bigint> = {
  encode: (writer, value) => writer.writeU64(value),
  decode: reader => reader.readU64(),
}

const bool: PayloadCodec<boolean> = {
  encode: (writer, value) => writer.writeU8(value ? 1 : 0),
  decode: reader => {
    const byte = reader.readU8()
    if (byte > 1) {
      throw new DecodeError(
        "invalid_record",
        `Boolean field must be 0 or 1, got ${byte}`,
      )
    }
    return byte === 1
  },
}

const bigSize: PayloadCodec<bigint> = {
  encode: (writer, value) => writeBigSize(writer, value),
  decode: reader => readBigSize(reader),
}

const bytes: PayloadCodec<Uint8Array> = {
  encode: (writer, value) => {
    writeBigSize(writer, value.length)
    writer.writeBytes(value)
  },
  decode: reader => reader.readLengthPrefixed("Bytes field"),
}

const string: PayloadCodec<string> = {
  encode: (writer, value) => bytes.encode(writer, textEncoder.encode(value)),
  decode: reader => {
    const raw = reader.readLengthPrefixed("String field")
    try {
      return textDecoder.decode(raw)
    } catch (error) {
      throw new DecodeError(
        "invalid_record",
        `String field is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`,
      )
    }
  },
}

/**
 * Exactly `length` bytes with no prefix (keys, hashes, signatures).
 */
function fixedBytes(length: number): PayloadCodec<Uint8Array> {
  return {
    encode: (writer, value) => {
      if (value.length !== length) {
        throw new EncodeError(
          "value_out_of_range",
          `Fixed field holds ${length} bytes, got ${value.length}`,
        )
      }
      writer.writeBytes(value)
    },
    decode: reader => reader.readBytes(length),
  }
}

/**
 * BigSize element count followed by the elements.
 */
function list<T>(element: PayloadCodec<T>): PayloadCodec<T[]> {
  return {
    encode: (writer, values) => {
      writeBigSize(writer, values.length)
      for (const value of values) {
        element.encode(writer, value)
      }
    },
    decode: reader => {
      const declared = readBigSize(reader)
      if (declared > BigInt(reader.maxRecordLength)) {
        throw new DecodeError(
          "record_too_large",
          `List declares ${declared} elements, maximum is ${reader.maxRecordLength}`,
        )
      }
      const values: T[] = []
      for (let i = 0n; i < declared; i++) {
        values.push(element.decode(reader))
      }
      return values
    },
  }
}

/**
 * Adapt a codec to another value type.
 */
function map<T, U>(
  inner: PayloadCodec<T>,
  decode: (value: T) => U,
  encode: (value: U) => T,
): PayloadCodec<U> {
  return {
    encode: (writer, value) => inner.encode(writer, encode(value)),
    decode: reader => decode(inner.decode(reader)),
  }
}

export const codecs = {
  u8,
  u16,
  u32,
  u64,
  bool,
  bigSize,
  bytes,
  string,
  fixedBytes,
  list,
  map,
} as const
