import { type TlvType, toTlvType } from "./tlv-type.js"

/**
 * Checks the value of a known TLV record, throwing a `DecodeError` when the
 * bytes do not match the type's encoding.
 */
export type RecordValidator = (value: Uint8Array, type: TlvType) => void

export type KnownTypeEntry =
  | TlvType
  | number
  | readonly [TlvType | number, RecordValidator]

/**
 * The TLV types a consumer understands, with an optional validator each.
 *
 * @example
 * ```typescript
 * const known = new KnownTypeTable([
 *   1,
 *   [2, value => {
 *     if (value.length !== 8) {
 *       throw new DecodeError("invalid_record", "type 2 carries a u64")
 *     }
 *   }],
 * ])
 * ```
 */
export class KnownTypeTable {
  private readonly validators = new Map<TlvType, RecordValidator | undefined>()

  constructor(entries: Iterable<KnownTypeEntry> = []) {
    for (const entry of entries) {
      if (typeof entry === "number" || typeof entry === "bigint") {
        this.validators.set(toTlvType(entry), undefined)
      } else {
        const [type, validator] = entry
        this.validators.set(toTlvType(type), validator)
      }
    }
  }

  static from(known: KnownTypeTable | Iterable<KnownTypeEntry>): KnownTypeTable {
    return known instanceof KnownTypeTable ? known : new KnownTypeTable(known)
  }

  get size(): number {
    return this.validators.size
  }

  has(type: TlvType): boolean {
    return this.validators.has(type)
  }

  /**
   * Run the validator registered for `type`, if any.
   */
  validate(type: TlvType, value: Uint8Array): void {
    this.validators.get(type)?.(value, type)
  }
}
