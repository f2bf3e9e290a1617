import { EncodeError } from "./errors.js"
import { compareTlvTypes, type TlvType, toTlvType } from "./tlv-type.js"

/**
 * Ordered set of TLV records, keyed by type.
 *
 * Keys are unique and iteration is always in ascending type order, which is
 * also the order records take on the wire. There is no removal: a stream
 * lives as long as the message that owns it.
 */
export class TlvStream implements Iterable<[TlvType, Uint8Array]> {
  private readonly records = new Map<TlvType, Uint8Array>()

  /**
   * Build a stream from entries that must not repeat a type.
   *
   * @throws EncodeError `duplicate_type` if a type appears twice
   */
  static from(
    entries: Iterable<readonly [TlvType | number, Uint8Array]>,
  ): TlvStream {
    const stream = new TlvStream()
    for (const [type, value] of entries) {
      if (!stream.insert(type, value)) {
        throw new EncodeError(
          "duplicate_type",
          `TLV type ${type} appears more than once`,
        )
      }
    }
    return stream
  }

  get size(): number {
    return this.records.size
  }

  get isEmpty(): boolean {
    return this.records.size === 0
  }

  /** Copy of the value stored under `type` */
  get(type: TlvType | number): Uint8Array | undefined {
    const value = this.records.get(BigInt(type))
    return value === undefined ? undefined : new Uint8Array(value)
  }

  has(type: TlvType | number): boolean {
    return this.records.has(BigInt(type))
  }

  /**
   * Store a copy of `value` under `type`.
   *
   * @returns false when the type was already present (its value is
   *   replaced). The wire format forbids repeated types, so a false result
   *   points at a bug in the caller.
   */
  insert(type: TlvType | number, value: Uint8Array): boolean {
    const key = toTlvType(type)
    const wasNew = !this.records.has(key)
    this.records.set(key, new Uint8Array(value))
    return wasNew
  }

  /** Types in ascending order */
  types(): TlvType[] {
    return [...this.records.keys()].sort(compareTlvTypes)
  }

  /** Records in ascending type order, each value a copy */
  *entries(): IterableIterator<[TlvType, Uint8Array]> {
    for (const type of this.types()) {
      const value = this.records.get(type)
      if (value !== undefined) {
        yield [type, new Uint8Array(value)]
      }
    }
  }

  [Symbol.iterator](): IterableIterator<[TlvType, Uint8Array]> {
    return this.entries()
  }

  equals(other: TlvStream): boolean {
    if (this.size !== other.size) return false
    for (const [type, value] of this.records) {
      const theirs = other.records.get(type)
      if (theirs === undefined || !bytesEqual(value, theirs)) {
        return false
      }
    }
    return true
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}
