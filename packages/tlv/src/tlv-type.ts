import { MAX_U64 } from "./constants.js"
import { EncodeError } from "./errors.js"

/**
 * TLV type field value: an unsigned 64-bit integer.
 */
export type TlvType = bigint

/**
 * Convert a number or bigint into a TLV type, rejecting values that do not
 * fit in 64 unsigned bits.
 */
export function toTlvType(value: number | bigint): TlvType {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new EncodeError(
      "value_out_of_range",
      `TLV type must be an integer, got ${value}`,
    )
  }
  const type = BigInt(value)
  if (type < 0n || type > MAX_U64) {
    throw new EncodeError(
      "value_out_of_range",
      `TLV type ${type} is outside the u64 range`,
    )
  }
  return type
}

/** Even types must be understood by the receiver */
export function isEven(type: TlvType | number): boolean {
  return BigInt(type) % 2n === 0n
}

/** Odd types may be ignored by a receiver that does not know them */
export function isOdd(type: TlvType | number): boolean {
  return !isEven(type)
}

export function compareTlvTypes(a: TlvType, b: TlvType): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
