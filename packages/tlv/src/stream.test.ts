import { describe, expect, it } from "vitest"
import { EncodeError } from "./errors.js"
import { TlvStream } from "./stream.js"
import { isEven, isOdd, toTlvType } from "./tlv-type.js"

describe("TlvType", () => {
  it("should classify parity", () => {
    expect(isEven(4n)).toBe(true)
    expect(isOdd(4n)).toBe(false)
    expect(isEven(5)).toBe(false)
    expect(isOdd(5)).toBe(true)
    expect(isEven(0n)).toBe(true)
  })

  it("should reject values outside the u64 range", () => {
    expect(() => toTlvType(-1)).toThrow(EncodeError)
    expect(() => toTlvType(1n << 64n)).toThrow(EncodeError)
    expect(toTlvType(0xffff_ffff_ffff_ffffn)).toBe(0xffff_ffff_ffff_ffffn)
  })
})

describe("TlvStream", () => {
  it("should start empty", () => {
    const stream = new TlvStream()
    expect(stream.isEmpty).toBe(true)
    expect(stream.size).toBe(0)
    expect(stream.get(1)).toBeUndefined()
  })

  it("should report whether an inserted type was new", () => {
    const stream = new TlvStream()
    expect(stream.insert(7, new Uint8Array([1]))).toBe(true)
    expect(stream.insert(7n, new Uint8Array([2]))).toBe(false)
    expect(stream.size).toBe(1)
    expect(stream.get(7)).toEqual(new Uint8Array([2]))
  })

  it("should look up number and bigint types alike", () => {
    const stream = new TlvStream()
    stream.insert(3n, new Uint8Array([0xaa]))
    expect(stream.has(3)).toBe(true)
    expect(stream.get(3)).toEqual(new Uint8Array([0xaa]))
  })

  it("should keep its own copy of inserted bytes", () => {
    const value = new Uint8Array([1, 2])
    const stream = new TlvStream()
    stream.insert(1, value)
    value[0] = 9
    expect(stream.get(1)).toEqual(new Uint8Array([1, 2]))
  })

  it("should hand out copies of stored bytes", () => {
    const stream = TlvStream.from([[1, new Uint8Array([1, 2])]])

    const fetched = stream.get(1)
    if (fetched !== undefined) fetched[0] = 9
    for (const [, value] of stream) value[1] = 9

    expect(stream.get(1)).toEqual(new Uint8Array([1, 2]))
  })

  it("should iterate in ascending type order", () => {
    const stream = new TlvStream()
    stream.insert(300, new Uint8Array([3]))
    stream.insert(1, new Uint8Array([1]))
    stream.insert(1n << 40n, new Uint8Array([4]))
    stream.insert(17, new Uint8Array([2]))

    expect(stream.types()).toEqual([1n, 17n, 300n, 1n << 40n])
    expect([...stream].map(([, value]) => value[0])).toEqual([1, 2, 3, 4])
  })

  it("should reject repeated types in from()", () => {
    expect(() =>
      TlvStream.from([
        [1, new Uint8Array()],
        [1n, new Uint8Array()],
      ]),
    ).toThrow(EncodeError)
  })

  it("should compare by contents", () => {
    const a = TlvStream.from([
      [1, new Uint8Array([1])],
      [2, new Uint8Array([2])],
    ])
    const b = TlvStream.from([
      [2, new Uint8Array([2])],
      [1, new Uint8Array([1])],
    ])
    const c = TlvStream.from([
      [1, new Uint8Array([1])],
      [2, new Uint8Array([3])],
    ])

    expect(a.equals(b)).toBe(true)
    expect(a.equals(c)).toBe(false)
    expect(a.equals(new TlvStream())).toBe(false)
  })
})
