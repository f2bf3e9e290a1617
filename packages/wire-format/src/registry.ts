/**
 * Dispatch registry and message codec.
 *
 * A registry is built once from one kind per message variant and is
 * read-only afterwards, so it can be shared by every decoding call site.
 */

import { getLogger, type Logger } from "@logtape/logtape"
import {
  attemptDecode,
  DecodeError,
  type DecodeResult,
  EncodeError,
  isEven,
  readStream,
  WireReader,
  WireWriter,
  writeStream,
} from "@peerwire/tlv"
import { type CodecConfig, resolveCodecConfig } from "./config.js"
import { RegistryError } from "./errors.js"
import type { AnyMessage, MessageKind } from "./message.js"

/**
 * One kind for each variant of `M`, keyed by the variant's `type`.
 * A missing or extra variant is a compile error.
 */
export type MessageKinds<M extends AnyMessage> = {
  readonly [K in M["type"]]: MessageKind<Extract<M, { type: K }>>
}

/**
 * Encodes and decodes a closed set of messages as
 * `[type code: u16 BE][payload][extensions]`.
 *
 * @example
 * ```typescript
 * const Hello = defineMessage("hello", 0x0001, codecs.string)
 * const Ping = defineEmptyMessage("ping", 0x0005)
 * type Request = MessageOf<typeof Hello> | MessageOf<typeof Ping>
 *
 * const requests = new MessageRegistry<Request>({ hello: Hello, ping: Ping })
 * const bytes = requests.encode({ type: "hello", payload: "world" })
 * const message = requests.decode(bytes)
 * ```
 */
export class MessageRegistry<M extends AnyMessage> {
  private readonly byCode = new Map<number, MessageKind<M>>()
  private readonly byType = new Map<string, MessageKind<M>>()
  private readonly config: CodecConfig
  private readonly logger: Logger

  /**
   * @throws RegistryError `duplicate_code` when two kinds share a code
   * @throws RangeError when a configured limit is invalid
   */
  constructor(
    kinds: MessageKinds<M>,
    config?: Partial<CodecConfig>,
    logger?: Logger,
  ) {
    this.config = resolveCodecConfig(config)
    this.logger = (logger ?? getLogger(["@peerwire", "wire-format"])).getChild(
      "registry",
    )

    for (const kind of Object.values<MessageKind<M>>(kinds)) {
      const existing = this.byCode.get(kind.code)
      if (existing !== undefined) {
        throw new RegistryError(
          "duplicate_code",
          `Messages ${existing.type} and ${kind.type} share code 0x${kind.code.toString(16).padStart(4, "0")}`,
        )
      }
      this.byCode.set(kind.code, kind)
      this.byType.set(kind.type, kind)
    }

    this.logger.debug("new MessageRegistry: {count} message kinds", {
      count: this.byCode.size,
    })
  }

  get size(): number {
    return this.byCode.size
  }

  /** Registered codes in ascending order */
  codes(): number[] {
    return [...this.byCode.keys()].sort((a, b) => a - b)
  }

  has(code: number): boolean {
    return this.byCode.has(code)
  }

  kindFor(code: number): MessageKind<M> | undefined {
    return this.byCode.get(code)
  }

  /**
   * Type code of a message type.
   *
   * @throws EncodeError `unregistered_message`
   */
  codeOf(type: M["type"]): number {
    return this.kindOf(type).code
  }

  private kindOf(type: string): MessageKind<M> {
    const kind = this.byType.get(type)
    if (kind === undefined) {
      throw new EncodeError(
        "unregistered_message",
        `Message type ${type} is not registered`,
      )
    }
    return kind
  }

  /**
   * Write the type code, payload and (for extensible kinds) extensions.
   */
  write(writer: WireWriter, message: M): void {
    const kind = this.kindOf(message.type)
    const { extensions } = message

    if (
      kind.extensions === undefined &&
      extensions !== undefined &&
      !extensions.isEmpty
    ) {
      throw new EncodeError(
        "not_extensible",
        `Message ${kind.type} does not take TLV extensions`,
      )
    }

    writer.writeU16(kind.code)
    kind.encodePayload(writer, message)
    if (extensions !== undefined) {
      writeStream(writer, extensions)
    }
  }

  /**
   * @throws EncodeError `message_too_large` when the result exceeds
   *   `maxMessageLength`
   */
  encode(message: M): Uint8Array {
    const writer = new WireWriter()
    this.write(writer, message)
    if (writer.position > this.config.maxMessageLength) {
      throw new EncodeError(
        "message_too_large",
        `Message ${message.type} encodes to ${writer.position} bytes, maximum is ${this.config.maxMessageLength}`,
      )
    }
    return writer.bytes()
  }

  /**
   * Read one message. The reader must be bounded to that message: extensible
   * kinds take every remaining byte as their TLV stream, and fixed kinds
   * reject leftover bytes.
   */
  read(reader: WireReader): M {
    const code = reader.readU16()
    const kind = this.byCode.get(code)
    if (kind === undefined) {
      throw new DecodeError(
        "unknown_message_type",
        `Unknown ${isEven(code) ? "even" : "odd"} message type 0x${code.toString(16).padStart(4, "0")}`,
        { type: code },
      )
    }

    const message = kind.decodePayload(reader)

    if (kind.extensions !== undefined) {
      const extensions = readStream(reader, kind.extensions)
      return { ...message, extensions }
    }

    if (reader.hasMore) {
      throw new DecodeError(
        "trailing_bytes",
        `Message ${kind.type} has ${reader.remaining} trailing bytes`,
        { type: code },
      )
    }
    return message
  }

  /**
   * Decode a buffer holding exactly one message.
   *
   * @throws DecodeError
   */
  decode(bytes: Uint8Array): M {
    try {
      this.checkMessageLength(bytes)
      return this.read(this.reader(bytes))
    } catch (error) {
      if (error instanceof DecodeError) {
        this.logger.debug("decode failed: {code} {message}", {
          code: error.code,
          message: error.message,
        })
      }
      throw error
    }
  }

  /**
   * Decode a buffer that may not hold the whole message yet.
   */
  tryDecode(bytes: Uint8Array): DecodeResult<M> {
    const result = attemptDecode(
      bytes,
      reader => {
        this.checkMessageLength(bytes)
        return this.read(reader)
      },
      { maxRecordLength: this.config.maxRecordLength },
    )
    if (result.status === "error") {
      this.logger.debug("decode failed: {code} {message}", {
        code: result.error.code,
        message: result.error.message,
      })
    }
    return result
  }

  private reader(bytes: Uint8Array): WireReader {
    return new WireReader(bytes, {
      maxRecordLength: this.config.maxRecordLength,
    })
  }

  private checkMessageLength(bytes: Uint8Array): void {
    if (bytes.length > this.config.maxMessageLength) {
      throw new DecodeError(
        "record_too_large",
        `Message of ${bytes.length} bytes exceeds maximum of ${this.config.maxMessageLength}`,
      )
    }
  }
}
