import {
  DecodeError,
  EncodeError,
  WireReader,
  WireWriter,
} from "@peerwire/tlv"
import { describe, expect, it } from "vitest"
import { codecs, type PayloadCodec } from "./codecs.js"

function encodeWith<T>(codec: PayloadCodec<T>, value: T): Uint8Array {
  const writer = new WireWriter()
  codec.encode(writer, value)
  return writer.bytes()
}

function decodeWith<T>(codec: PayloadCodec<T>, bytes: number[]): T {
  return codec.decode(new WireReader(new Uint8Array(bytes)))
}

function decodeError(run: () => unknown): DecodeError {
  try {
    run()
  } catch (error) {
    if (error instanceof DecodeError) return error
    throw error
  }
  throw new Error("expected a DecodeError")
}

describe("codecs", () => {
  describe("integers", () => {
    it("should write big-endian", () => {
      expect(encodeWith(codecs.u16, 0x1234)).toEqual(
        new Uint8Array([0x12, 0x34]),
      )
      expect(encodeWith(codecs.u32, 0x01020304)).toEqual(
        new Uint8Array([1, 2, 3, 4]),
      )
      expect(decodeWith(codecs.u64, [0, 0, 0, 0, 0, 0, 1, 0])).toBe(256n)
    })

    it("should reject values that do not fit", () => {
      expect(() => encodeWith(codecs.u8, 256)).toThrow(EncodeError)
      expect(() => encodeWith(codecs.u16, -1)).toThrow(EncodeError)
    })

    it("should encode BigSize fields minimally", () => {
      expect(encodeWith(codecs.bigSize, 300n)).toEqual(
        new Uint8Array([0xfd, 0x01, 0x2c]),
      )
      expect(decodeWith(codecs.bigSize, [0xfc])).toBe(0xfcn)
    })
  })

  describe("bool", () => {
    it("should accept 0 and 1", () => {
      expect(encodeWith(codecs.bool, true)).toEqual(new Uint8Array([1]))
      expect(decodeWith(codecs.bool, [0])).toBe(false)
    })

    it("should reject any other byte", () => {
      expect(decodeError(() => decodeWith(codecs.bool, [2])).code).toBe(
        "invalid_record",
      )
    })
  })

  describe("string", () => {
    it("should prefix the UTF-8 length", () => {
      expect(encodeWith(codecs.string, "world")).toEqual(
        new Uint8Array([0x05, 0x77, 0x6f, 0x72, 0x6c, 0x64]),
      )
      expect(decodeWith(codecs.string, [0x02, 0xc3, 0xa9])).toBe("é")
    })

    it("should reject invalid UTF-8", () => {
      expect(decodeError(() => decodeWith(codecs.string, [0x01, 0xff])).code).toBe(
        "invalid_record",
      )
    })

    it("should mark a short string as incomplete", () => {
      const error = decodeError(() => decodeWith(codecs.string, [0x05, 0x77]))
      expect(error.code).toBe("record_too_large")
      expect(error.needed).toBe(4)
    })
  })

  describe("fixedBytes", () => {
    it("should write exactly the declared length", () => {
      const codec = codecs.fixedBytes(3)
      expect(encodeWith(codec, new Uint8Array([1, 2, 3]))).toEqual(
        new Uint8Array([1, 2, 3]),
      )
      expect(() => encodeWith(codec, new Uint8Array([1, 2]))).toThrow(
        EncodeError,
      )
    })

    it("should be incomplete when the input is short", () => {
      const error = decodeError(() => decodeWith(codecs.fixedBytes(4), [1]))
      expect(error.code).toBe("truncated_input")
      expect(error.needed).toBe(3)
    })
  })

  describe("list", () => {
    it("should prefix the element count", () => {
      const codec = codecs.list(codecs.u8)
      expect(encodeWith(codec, [7, 8, 9])).toEqual(new Uint8Array([3, 7, 8, 9]))
      expect(decodeWith(codec, [0])).toEqual([])
      expect(decodeWith(codec, [2, 7, 8])).toEqual([7, 8])
    })

    it("should reject a count above the record limit", () => {
      const error = decodeError(() =>
        decodeWith(codecs.list(codecs.u8), [0xfe, 0x00, 0x01, 0x00, 0x00]),
      )
      expect(error.code).toBe("record_too_large")
      expect(error.incomplete).toBe(false)
    })
  })

  describe("map", () => {
    it("should convert in both directions", () => {
      const seconds = codecs.map(
        codecs.u32,
        value => new Date(value * 1000),
        (date: Date) => date.getTime() / 1000,
      )
      expect(encodeWith(seconds, new Date(0x100 * 1000))).toEqual(
        new Uint8Array([0, 0, 1, 0]),
      )
      expect(decodeWith(seconds, [0, 0, 0, 2]).getTime()).toBe(2000)
    })
  })
})
