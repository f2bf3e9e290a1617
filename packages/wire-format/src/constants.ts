/**
 * Wire format constants for peerwire messages.
 *
 * Message Structure:
 * ┌──────────────┬──────────────────────────────┬──────────────────────┐
 * │ Type code    │ Payload                      │ Extensions           │
 * │ (2 bytes BE) │ (kind-specific)              │ (TLV stream, opt.)   │
 * └──────────────┴──────────────────────────────┴──────────────────────┘
 */

/** Size of the message type code in bytes */
export const TYPE_CODE_SIZE = 2

/** Largest message type code */
export const MAX_TYPE_CODE = 0xffff

/** Size of the frame prefix: 2-byte payload length plus its 16-byte MAC */
export const FRAME_PREFIX_SIZE = 2 + 16

/** Size of the frame suffix: 16-byte MAC of the payload */
export const FRAME_SUFFIX_SIZE = 16

/** Largest frame payload a 2-byte length can express */
export const MAX_FRAME_PAYLOAD_SIZE = 0xffff

/** Largest transport frame */
export const MAX_FRAME_SIZE =
  FRAME_PREFIX_SIZE + MAX_FRAME_PAYLOAD_SIZE + FRAME_SUFFIX_SIZE
