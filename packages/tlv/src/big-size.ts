/**
 * BigSize: the canonical variable-length unsigned integer of the wire format.
 *
 * ┌──────────────────────────────┬──────────────────────────────────┐
 * │ Value                        │ Encoding                         │
 * ├──────────────────────────────┼──────────────────────────────────┤
 * │ 0x00 … 0xfc                  │ 1 byte                           │
 * │ 0xfd … 0xffff                │ 0xfd + 2 bytes big-endian        │
 * │ 0x10000 … 0xffffffff         │ 0xfe + 4 bytes big-endian        │
 * │ 0x100000000 … 2^64-1         │ 0xff + 8 bytes big-endian        │
 * └──────────────────────────────┴──────────────────────────────────┘
 *
 * Decoding rejects any form wider than the value needs.
 */

import { BigSizeMinimum, BigSizePrefix, MAX_U64 } from "./constants.js"
import type { WireReader, WireWriter } from "./cursor.js"
import { DecodeError, EncodeError } from "./errors.js"

function toU64(value: number | bigint): bigint {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new EncodeError(
      "value_out_of_range",
      `BigSize value must be an integer, got ${value}`,
    )
  }
  const big = BigInt(value)
  if (big < 0n || big > MAX_U64) {
    throw new EncodeError(
      "value_out_of_range",
      `BigSize value ${big} is outside the u64 range`,
    )
  }
  return big
}

/**
 * Number of bytes the BigSize encoding of `value` occupies.
 */
export function bigSizeLength(value: number | bigint): number {
  const big = toU64(value)
  if (big < BigSizeMinimum.U16) return 1
  if (big < BigSizeMinimum.U32) return 3
  if (big < BigSizeMinimum.U64) return 5
  return 9
}

export function writeBigSize(writer: WireWriter, value: number | bigint): void {
  const big = toU64(value)
  if (big < BigSizeMinimum.U16) {
    writer.writeU8(Number(big))
  } else if (big < BigSizeMinimum.U32) {
    writer.writeU8(BigSizePrefix.U16)
    writer.writeU16(Number(big))
  } else if (big < BigSizeMinimum.U64) {
    writer.writeU8(BigSizePrefix.U32)
    writer.writeU32(Number(big))
  } else {
    writer.writeU8(BigSizePrefix.U64)
    writer.writeU64(big)
  }
}

export function encodeBigSize(value: number | bigint): Uint8Array {
  const big = toU64(value)
  const bytes = new Uint8Array(bigSizeLength(big))
  const view = new DataView(bytes.buffer)
  switch (bytes.length) {
    case 1:
      view.setUint8(0, Number(big))
      break
    case 3:
      view.setUint8(0, BigSizePrefix.U16)
      view.setUint16(1, Number(big), false)
      break
    case 5:
      view.setUint8(0, BigSizePrefix.U32)
      view.setUint32(1, Number(big), false)
      break
    default:
      view.setUint8(0, BigSizePrefix.U64)
      view.setBigUint64(1, big, false)
  }
  return bytes
}

/**
 * Read one BigSize integer.
 *
 * @throws DecodeError `malformed_varint` for a non-minimal encoding, or
 *   (marked incomplete) when the input ends inside an integer that can
 *   still turn out minimal
 */
export function readBigSize(reader: WireReader): bigint {
  if (!reader.hasMore) {
    throw new DecodeError("malformed_varint", "BigSize: no bytes remain", {
      needed: 1,
    })
  }

  const prefix = reader.readU8()
  let width: number
  let minimum: bigint
  switch (prefix) {
    case BigSizePrefix.U16:
      width = 2
      minimum = BigSizeMinimum.U16
      break
    case BigSizePrefix.U32:
      width = 4
      minimum = BigSizeMinimum.U32
      break
    case BigSizePrefix.U64:
      width = 8
      minimum = BigSizeMinimum.U64
      break
    default:
      return BigInt(prefix)
  }

  if (reader.remaining < width) {
    // Largest value the bytes seen so far could still complete to
    const available = reader.remaining
    let upper = 0n
    for (const byte of reader.readBytes(available)) {
      upper = (upper << 8n) | BigInt(byte)
    }
    upper = ((upper + 1n) << BigInt(8 * (width - available))) - 1n
    if (upper < minimum) {
      throw new DecodeError(
        "malformed_varint",
        `BigSize not minimally encoded: 0x${prefix.toString(16)} prefix followed by leading zero bytes`,
      )
    }
    throw new DecodeError(
      "malformed_varint",
      `BigSize truncated: 0x${prefix.toString(16)} needs ${width} more bytes, only ${available} available`,
      { needed: width - available },
    )
  }

  const value =
    width === 2
      ? BigInt(reader.readU16())
      : width === 4
        ? BigInt(reader.readU32())
        : reader.readU64()

  if (value < minimum) {
    throw new DecodeError(
      "malformed_varint",
      `BigSize not minimally encoded: ${value} written with 0x${prefix.toString(16)} prefix`,
    )
  }
  return value
}
