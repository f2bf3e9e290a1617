import { describe, expect, it } from "vitest"
import { codecs } from "./codecs.js"
import { RegistryError } from "./errors.js"
import { defineEmptyMessage, defineMessage } from "./message.js"

describe("defineMessage", () => {
  it("should keep the code on the kind", () => {
    const kind = defineMessage("hello", 0x0001, codecs.string)
    expect(kind.type).toBe("hello")
    expect(kind.code).toBe(1)
    expect(kind.extensions).toBeUndefined()
  })

  it("should reject codes outside the u16 range", () => {
    expect(() => defineMessage("big", 0x1_0000, codecs.u8)).toThrow(
      RegistryError,
    )
    expect(() => defineEmptyMessage("negative", -1)).toThrow(RegistryError)
    expect(() => defineEmptyMessage("fraction", 1.5)).toThrow(RegistryError)
  })

  it("should resolve extension options", () => {
    const open = defineEmptyMessage("a", 1, { extensions: true }).extensions
    expect(open?.enforceEvenOdd).toBe(true)
    expect(open?.knownTypes.size).toBe(0)

    expect(
      defineEmptyMessage("b", 2, { extensions: false }).extensions,
    ).toBeUndefined()

    const known = defineEmptyMessage("c", 3, {
      extensions: { knownTypes: [1] },
    }).extensions
    expect(known?.enforceEvenOdd).toBe(true)
    expect(known?.knownTypes.has(1n)).toBe(true)

    expect(
      defineEmptyMessage("d", 4, { extensions: { enforceEvenOdd: false } })
        .extensions?.enforceEvenOdd,
    ).toBe(false)
  })

  it("should copy known types when the kind is defined", () => {
    const knownTypes = [1, 2]
    const kind = defineEmptyMessage("e", 5, { extensions: { knownTypes } })
    knownTypes.length = 0
    expect(kind.extensions?.knownTypes.size).toBe(2)
  })
})
