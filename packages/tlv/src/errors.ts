/**
 * Error types shared by every codec in the presentation layer.
 */

import type { TlvType } from "./tlv-type.js"

/**
 * Error codes for decode failures.
 */
export type DecodeErrorCode =
  | "malformed_varint"
  | "out_of_order_type"
  | "duplicate_type"
  | "record_too_large"
  | "unknown_even_type"
  | "unknown_message_type"
  | "truncated_input"
  | "trailing_bytes"
  | "invalid_record"

export type DecodeErrorDetails = {
  /** Bytes still missing when the failure is only caused by input ending early */
  needed?: number
  /** TLV type or message code the failure is about */
  type?: TlvType | number
}

/**
 * Error thrown when decoding bytes fails.
 *
 * A failure with `incomplete === true` means the bytes seen so far are valid
 * but the input ended early; a streaming caller may wait for more bytes.
 * Any other failure is a protocol violation and the bytes must not be
 * reprocessed.
 */
export class DecodeError extends Error {
  override readonly name = "DecodeError"
  readonly needed: number | undefined
  readonly type: TlvType | number | undefined

  constructor(
    public readonly code: DecodeErrorCode,
    message: string,
    details: DecodeErrorDetails = {},
  ) {
    super(message)
    this.needed = details.needed
    this.type = details.type
    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DecodeError)
    }
  }

  get incomplete(): boolean {
    return this.needed !== undefined
  }
}

/**
 * Error codes for encode failures.
 */
export type EncodeErrorCode =
  | "value_out_of_range"
  | "duplicate_type"
  | "unregistered_message"
  | "not_extensible"
  | "message_too_large"

/**
 * Error thrown when a value cannot be written to the wire.
 */
export class EncodeError extends Error {
  override readonly name = "EncodeError"

  constructor(
    public readonly code: EncodeErrorCode,
    message: string,
  ) {
    super(message)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EncodeError)
    }
  }
}
