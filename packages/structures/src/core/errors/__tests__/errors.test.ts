import { BaseError } from "@qredis/errors"
import {
  ConfigurationError,
  ConnectivityError,
  DecodingError,
  EncodingError,
  isStructureError,
  ParseError,
  RoutingIndexError,
} from "../errors"

describe("structure errors", () => {
  it("extend BaseError with their code", () => {
    const errors = [
      new ConnectivityError("down"),
      new ConfigurationError("bad"),
      new ParseError("garbled"),
      new RoutingIndexError("lost"),
      new EncodingError(1, { encoder: "json", key: "queue:a", cause: undefined }),
      new DecodingError("x", { encoder: "json", key: "queue:a", cause: undefined }),
    ]

    expect(errors.every((e) => e instanceof BaseError)).toBe(true)
    expect(errors.map((e) => e.code)).toStrictEqual([
      "connectivity_error",
      "configuration_error",
      "parse_error",
      "routing_index_error",
      "encoding_error",
      "decoding_error",
    ])
  })

  it("marks connectivity failures retryable", () => {
    expect(new ConnectivityError("down").isRetryable).toBe(true)
    expect(new ConfigurationError("bad").isRetryable).toBe(false)
  })

  it("marks routing failures as non-operational", () => {
    expect(new RoutingIndexError("lost").isOperational).toBe(false)
    expect(new ParseError("garbled").isOperational).toBe(true)
  })

  it("serializes with context and cause", () => {
    const err = new DecodingError("raw-bytes", {
      encoder: "zlib",
      key: "stack:s",
      cause: new Error("incorrect header check"),
    })

    expect(err.toJSON()).toMatchObject({
      name: "DecodingError",
      code: "decoding_error",
      message: 'Encoder "zlib" failed to decode value from stack:s',
      context: { raw: "raw-bytes", encoder: "zlib", key: "stack:s" },
      cause: { name: "Error", code: "unknown", message: "incorrect header check" },
    })
  })
})

describe("isStructureError", () => {
  it("accepts errors raised by this package", () => {
    expect(isStructureError(new ParseError("garbled"))).toBe(true)
  })

  it("accepts a structurally matching error from elsewhere", () => {
    const foreign = Object.assign(new Error("copy"), {
      code: "connectivity_error",
      context: {},
      isRetryable: true,
      isOperational: true,
      timestamp: new Date(0),
    })

    expect(isStructureError(foreign)).toBe(true)
  })

  it("rejects other codes and plain errors", () => {
    expect(isStructureError(new BaseError("x", { code: "other_error" }))).toBe(false)
    expect(isStructureError(new Error("plain"))).toBe(false)
    expect(isStructureError("connectivity_error")).toBe(false)
  })
})
