/**
 * Byte cursors used by every decoder and encoder.
 *
 * A `WireReader` only ever reads inside the buffer it was given, and checks
 * every declared length against `maxRecordLength` before allocating.
 */

import { readBigSize } from "./big-size.js"
import { DEFAULT_MAX_RECORD_LENGTH } from "./constants.js"
import { DecodeError, EncodeError } from "./errors.js"

const INITIAL_CAPACITY = 64
const GROWTH_FACTOR = 2

export interface ReaderOptions {
  /** Largest length a length-prefixed value may declare (default: 65535) */
  maxRecordLength?: number
}

export class WireReader {
  private readonly buffer: Uint8Array
  private readonly view: DataView
  private pos = 0
  readonly maxRecordLength: number

  constructor(data: Uint8Array, options: ReaderOptions = {}) {
    this.buffer = data
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
    this.maxRecordLength = options.maxRecordLength ?? DEFAULT_MAX_RECORD_LENGTH
  }

  get position(): number {
    return this.pos
  }

  get remaining(): number {
    return this.buffer.length - this.pos
  }

  get hasMore(): boolean {
    return this.pos < this.buffer.length
  }

  /**
   * Fail with an incomplete `truncated_input` unless `count` bytes remain.
   */
  ensure(count: number): void {
    if (count > this.remaining) {
      throw new DecodeError(
        "truncated_input",
        `Input truncated: needed ${count} bytes, only ${this.remaining} available`,
        { needed: count - this.remaining },
      )
    }
  }

  readU8(): number {
    this.ensure(1)
    const value = this.view.getUint8(this.pos)
    this.pos += 1
    return value
  }

  readU16(): number {
    this.ensure(2)
    const value = this.view.getUint16(this.pos, false)
    this.pos += 2
    return value
  }

  readU32(): number {
    this.ensure(4)
    const value = this.view.getUint32(this.pos, false)
    this.pos += 4
    return value
  }

  readU64(): bigint {
    this.ensure(8)
    const value = this.view.getBigUint64(this.pos, false)
    this.pos += 8
    return value
  }

  /**
   * Read `length` bytes into a fresh buffer owned by the caller.
   */
  readBytes(length: number): Uint8Array {
    this.ensure(length)
    const bytes = this.buffer.slice(this.pos, this.pos + length)
    this.pos += length
    return bytes
  }

  /**
   * Validate a declared length before anything is allocated for it.
   *
   * @returns the length as a number
   * @throws DecodeError `record_too_large` when the length exceeds the
   *   maximum, or (marked incomplete) the remaining input
   */
  checkLength(declared: bigint, what = "Record"): number {
    if (declared > BigInt(this.maxRecordLength)) {
      throw new DecodeError(
        "record_too_large",
        `${what} declares ${declared} bytes, maximum is ${this.maxRecordLength}`,
      )
    }
    const length = Number(declared)
    if (length > this.remaining) {
      throw new DecodeError(
        "record_too_large",
        `${what} declares ${length} bytes, only ${this.remaining} remain`,
        { needed: length - this.remaining },
      )
    }
    return length
  }

  /**
   * Read a BigSize length followed by that many bytes.
   */
  readLengthPrefixed(what?: string): Uint8Array {
    const length = this.checkLength(readBigSize(this), what)
    return this.readBytes(length)
  }
}

/**
 * Growable output buffer.
 */
export class WireWriter {
  private buffer: Uint8Array
  private view: DataView
  private pos = 0

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(initialCapacity)
    this.view = new DataView(this.buffer.buffer)
  }

  get position(): number {
    return this.pos
  }

  /**
   * Returns a copy of the bytes written so far.
   */
  bytes(): Uint8Array {
    return this.buffer.slice(0, this.pos)
  }

  private ensureCapacity(needed: number): void {
    const required = this.pos + needed
    if (required <= this.buffer.length) {
      return
    }

    let capacity = Math.max(this.buffer.length, 1) * GROWTH_FACTOR
    while (capacity < required) {
      capacity *= GROWTH_FACTOR
    }

    const grown = new Uint8Array(capacity)
    grown.set(this.buffer.subarray(0, this.pos))
    this.buffer = grown
    this.view = new DataView(this.buffer.buffer)
  }

  writeU8(value: number): void {
    checkUnsigned(value, 0xff)
    this.ensureCapacity(1)
    this.view.setUint8(this.pos, value)
    this.pos += 1
  }

  writeU16(value: number): void {
    checkUnsigned(value, 0xffff)
    this.ensureCapacity(2)
    this.view.setUint16(this.pos, value, false)
    this.pos += 2
  }

  writeU32(value: number): void {
    checkUnsigned(value, 0xffff_ffff)
    this.ensureCapacity(4)
    this.view.setUint32(this.pos, value, false)
    this.pos += 4
  }

  writeU64(value: bigint): void {
    if (value < 0n || value > 0xffff_ffff_ffff_ffffn) {
      throw new EncodeError(
        "value_out_of_range",
        `${value} does not fit in 8 unsigned bytes`,
      )
    }
    this.ensureCapacity(8)
    this.view.setBigUint64(this.pos, value, false)
    this.pos += 8
  }

  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length)
    this.buffer.set(data, this.pos)
    this.pos += data.length
  }
}

function checkUnsigned(value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new EncodeError(
      "value_out_of_range",
      `${value} is not an unsigned integer no greater than ${max}`,
    )
  }
}
