/**
 * Three-way decode outcome for callers reading from a byte stream.
 */

import { type ReaderOptions, WireReader } from "./cursor.js"
import { DecodeError } from "./errors.js"

/**
 * Result of a decode attempt over possibly incomplete input.
 *
 * - `complete`: a value was decoded from the first `bytesRead` bytes
 * - `pending`: the bytes so far are valid, at least `needed` more are required
 * - `error`: the bytes violate the protocol and must be discarded
 */
export type DecodeResult<T> =
  | { status: "complete"; value: T; bytesRead: number }
  | { status: "pending"; needed: number }
  | { status: "error"; error: DecodeError }

/**
 * Run `decode` over `bytes`, mapping decode failures to a `DecodeResult`.
 * Exceptions other than `DecodeError` propagate.
 */
export function attemptDecode<T>(
  bytes: Uint8Array,
  decode: (reader: WireReader) => T,
  options: ReaderOptions = {},
): DecodeResult<T> {
  const reader = new WireReader(bytes, options)
  try {
    const value = decode(reader)
    return { status: "complete", value, bytesRead: reader.position }
  } catch (error) {
    if (!(error instanceof DecodeError)) {
      throw error
    }
    if (error.needed !== undefined) {
      return { status: "pending", needed: error.needed }
    }
    return { status: "error", error }
  }
}
