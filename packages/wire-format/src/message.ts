/**
 * Message kinds: the per-variant half of the dispatch registry.
 *
 * Each kind ties a string discriminator to a fixed numeric type code and a
 * payload codec. The code is part of the kind's definition and is never
 * stored on message values.
 */

import {
  KnownTypeTable,
  type StreamPolicy,
  type TlvStream,
  type WireReader,
  type WireWriter,
} from "@peerwire/tlv"
import type { PayloadCodec } from "./codecs.js"
import { MAX_TYPE_CODE } from "./constants.js"
import { RegistryError } from "./errors.js"

/**
 * Shape shared by every message value.
 */
export type AnyMessage = {
  readonly type: string
  /** TLV records following the payload (extensible kinds only) */
  readonly extensions?: TlvStream
}

export type PayloadMessage<T extends string, P> = {
  readonly type: T
  readonly payload: P
  readonly extensions?: TlvStream
}

export type EmptyMessage<T extends string> = {
  readonly type: T
  readonly extensions?: TlvStream
}

/**
 * How the TLV stream after an extensible kind's payload is checked.
 * The even/odd rule applies unless `enforceEvenOdd` is `false`.
 */
export type ExtensionPolicy = StreamPolicy

/**
 * Extension policy fixed when the kind is defined.
 */
export interface ExtensionRules {
  readonly knownTypes: KnownTypeTable
  readonly enforceEvenOdd: boolean
}

export interface MessageOptions {
  /**
   * Payload is followed by a TLV stream. `true` understands no extension
   * types, so any even type is rejected; a policy names the known types.
   */
  extensions?: ExtensionPolicy | boolean
}

export interface MessageKind<M extends AnyMessage> {
  readonly type: M["type"]
  readonly code: number
  /** Present when the payload may be followed by a TLV stream */
  readonly extensions: ExtensionRules | undefined
  encodePayload(writer: WireWriter, message: M): void
  decodePayload(reader: WireReader): M
}

/**
 * Message value type produced by a kind.
 */
export type MessageOf<K> = K extends MessageKind<infer M> ? M : never

function checkCode(type: string, code: number): void {
  if (!Number.isInteger(code) || code < 0 || code > MAX_TYPE_CODE) {
    throw new RegistryError(
      "invalid_code",
      `Message ${type} has code ${code}, codes are 0..0x${MAX_TYPE_CODE.toString(16)}`,
    )
  }
}

function extensionRules(options: MessageOptions): ExtensionRules | undefined {
  const { extensions } = options
  if (extensions === undefined || extensions === false) return undefined
  const policy: ExtensionPolicy = extensions === true ? {} : extensions
  return {
    knownTypes: KnownTypeTable.from(policy.knownTypes ?? []),
    enforceEvenOdd: policy.enforceEvenOdd ?? true,
  }
}

/**
 * Define a message kind carrying a payload.
 *
 * @example
 * ```typescript
 * const Hello = defineMessage("hello", 0x0001, codecs.string)
 * // { type: "hello", payload: "world" } ⇄ 00 01 05 77 6f 72 6c 64
 * ```
 */
export function defineMessage<T extends string, P>(
  type: T,
  code: number,
  payload: PayloadCodec<P>,
  options: MessageOptions = {},
): MessageKind<PayloadMessage<T, P>> {
  checkCode(type, code)
  return {
    type,
    code,
    extensions: extensionRules(options),
    encodePayload: (writer, message) => payload.encode(writer, message.payload),
    decodePayload: reader => ({ type, payload: payload.decode(reader) }),
  }
}

/**
 * Define a message kind whose payload is empty.
 */
export function defineEmptyMessage<T extends string>(
  type: T,
  code: number,
  options: MessageOptions = {},
): MessageKind<EmptyMessage<T>> {
  checkCode(type, code)
  return {
    type,
    code,
    extensions: extensionRules(options),
    encodePayload: () => {},
    decodePayload: () => ({ type }),
  }
}
