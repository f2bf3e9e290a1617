/**
 * @peerwire/wire-format
 *
 * Typed message encoding for the peerwire presentation layer.
 *
 * Every message is written as a 2-byte big-endian type code followed by its
 * payload; extensible messages end with a TLV stream. Decoding goes through
 * a `MessageRegistry`, an immutable table from type code to message kind
 * built once per message set.
 *
 * @example
 * ```typescript
 * import {
 *   codecs,
 *   DecodeError,
 *   defineEmptyMessage,
 *   defineMessage,
 *   MessageRegistry,
 *   type MessageOf,
 * } from "@peerwire/wire-format"
 *
 * const Hello = defineMessage("hello", 0x0001, codecs.string)
 * const NoArgs = defineEmptyMessage("no-args", 0x0005)
 * type Request = MessageOf<typeof Hello> | MessageOf<typeof NoArgs>
 *
 * const requests = new MessageRegistry<Request>({
 *   hello: Hello,
 *   "no-args": NoArgs,
 * })
 *
 * const bytes = requests.encode({ type: "hello", payload: "world" })
 *
 * const result = requests.tryDecode(bytes)
 * switch (result.status) {
 *   case "complete":
 *     console.log(result.value.type)
 *     break
 *   case "pending":
 *     // wait for result.needed more bytes
 *     break
 *   case "error":
 *     console.error(`Decode failed: ${result.error.code}`)
 * }
 * ```
 */

// Field codecs
export { codecs, type PayloadCodec } from "./codecs.js"
// Configuration
export {
  type CodecConfig,
  DEFAULT_CODEC_CONFIG,
  resolveCodecConfig,
} from "./config.js"
// Constants
export {
  FRAME_PREFIX_SIZE,
  FRAME_SUFFIX_SIZE,
  MAX_FRAME_PAYLOAD_SIZE,
  MAX_FRAME_SIZE,
  MAX_TYPE_CODE,
  TYPE_CODE_SIZE,
} from "./constants.js"
// Errors
export { RegistryError, type RegistryErrorCode } from "./errors.js"
// Message kinds
export {
  type AnyMessage,
  defineEmptyMessage,
  defineMessage,
  type EmptyMessage,
  type ExtensionPolicy,
  type ExtensionRules,
  type MessageKind,
  type MessageOf,
  type MessageOptions,
  type PayloadMessage,
} from "./message.js"
// Registry
export { type MessageKinds, MessageRegistry } from "./registry.js"
// Shared error taxonomy and results
export {
  type DecodeErrorCode,
  DecodeError,
  type DecodeResult,
  EncodeError,
  type EncodeErrorCode,
  isEven,
  isOdd,
  KnownTypeTable,
  TlvStream,
} from "@peerwire/tlv"
