import { MAX_FRAME_PAYLOAD_SIZE } from "./constants.js"

/**
 * Limits applied while encoding and decoding messages.
 */
export interface CodecConfig {
  /** Largest encoded message, type code included (default: 65535) */
  maxMessageLength: number
  /** Largest length any length-prefixed field may declare (default: 65535) */
  maxRecordLength: number
}

/**
 * Default configuration values.
 */
export const DEFAULT_CODEC_CONFIG: CodecConfig = {
  maxMessageLength: MAX_FRAME_PAYLOAD_SIZE,
  maxRecordLength: MAX_FRAME_PAYLOAD_SIZE,
}

/**
 * Merge overrides onto the defaults.
 *
 * @throws RangeError if a limit is not a positive integer
 */
export function resolveCodecConfig(config?: Partial<CodecConfig>): CodecConfig {
  const resolved = { ...DEFAULT_CODEC_CONFIG, ...config }
  for (const [key, value] of Object.entries(resolved)) {
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new RangeError(`${key} must be a positive integer, got ${value}`)
    }
  }
  return resolved
}
