import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("creates error with required fields", () => {
      const err = new BaseError("store unreachable", { code: "connectivity_error" })

      expect(err.message).toBe("store unreachable")
      expect(err.code).toBe("connectivity_error")
    })

    it("sets name to constructor name", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.name).toBe("BaseError")
    })

    it("defaults context to an empty frozen object", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults isRetryable to false and isOperational to true", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
    })

    it("sets timestamp to current time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("keeps context, cause and flags", () => {
      const cause = new Error("socket closed")
      const err = new BaseError("wrapped", {
        code: "connectivity_error",
        context: { key: "queue:jobs" },
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.context).toEqual({ key: "queue:jobs" })
      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("freezes a copy of the given context", () => {
      const err = new BaseError("test", { code: "test", context: { key: "stack:a" } })

      expect(Object.isFrozen(err.context)).toBe(true)
    })
  })

  describe("subclasses", () => {
    class RoutingError extends BaseError<"routing_error"> {
      constructor(message: string) {
        super(message, { code: "routing_error" })
      }
    }

    it("takes the subclass name and stays instanceof both", () => {
      const err = new RoutingError("bad index")

      expect(err.name).toBe("RoutingError")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
    })
  })

  describe("toJSON", () => {
    it("returns serialized error", () => {
      const err = new BaseError("decode failed", {
        code: "decoding_error",
        context: { raw: "{oops" },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "decoding_error",
        message: "decode failed",
        context: { raw: "{oops" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
