import { deflateSync, inflateSync } from "node:zlib"
import { z } from "zod"
import { ParseError } from "../../errors/errors"
import { compressionEncoder } from "../compression-encoder"

describe("CompressionEncoder", () => {
  const encoder = compressionEncoder()

  it("stores deflated JSON as base64", () => {
    const encoded = encoder.encode({ msg: "hello" })

    expect(encoded).toMatch(/^[A-Za-z0-9+/]+=*$/)
    expect(inflateSync(Buffer.from(encoded, "base64")).toString("utf8")).toBe('{"msg":"hello"}')
  })

  it("decodes what it encoded", () => {
    const value = { rows: [[1, 2], [3, 4]], label: "matrix" }

    expect(encoder.decode(encoder.encode(value))).toStrictEqual(value)
  })

  it("shrinks repetitive payloads", () => {
    const text = "abc".repeat(500)

    expect(encoder.encode(text).length).toBeLessThan(text.length)
  })

  it("accepts a compression level", () => {
    const fast = compressionEncoder({ level: 1 })

    expect(fast.decode(fast.encode(["x", "y"]))).toStrictEqual(["x", "y"])
  })

  it("checks items against the schema before compressing", () => {
    const counts = compressionEncoder({ schema: z.array(z.number().int()) })

    expect(() => counts.encode([1, 2.5])).toThrow(ParseError)
    expect(() => encoder.encode(Number.NaN)).toThrow("Value does not match schema")
  })

  it("throws ParseError for data that is not zlib", () => {
    expect(() => encoder.decode("bm90IGNvbXByZXNzZWQ=")).toThrow(
      "Value is not zlib-compressed data",
    )
  })

  it("parses a string that looks like code as plain data", () => {
    const strings = compressionEncoder({ schema: z.string() })

    expect(strings.decode(strings.encode("(() => 1)()"))).toBe("(() => 1)()")
  })

  it("rejects inflated text that is not JSON", () => {
    const raw = deflateSync("not json").toString("base64")

    expect(() => encoder.decode(raw)).toThrow(ParseError)
    expect(() => encoder.decode(raw)).toThrow("Malformed JSON")
  })
})
