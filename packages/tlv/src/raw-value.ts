/**
 * TLV value field: BigSize length followed by the raw bytes.
 */

import { bigSizeLength, writeBigSize } from "./big-size.js"
import type { WireReader, WireWriter } from "./cursor.js"

export function writeRawValue(writer: WireWriter, value: Uint8Array): void {
  writeBigSize(writer, value.length)
  writer.writeBytes(value)
}

/**
 * Read a length-prefixed value. The declared length is checked against the
 * reader's maximum and the remaining input before the value is copied out.
 */
export function readRawValue(reader: WireReader): Uint8Array {
  return reader.readLengthPrefixed("TLV record")
}

/** Encoded size of a value including its length prefix */
export function rawValueLength(value: Uint8Array): number {
  return bigSizeLength(value.length) + value.length
}
