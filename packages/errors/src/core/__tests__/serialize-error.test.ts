import { BaseError } from "../base-error"
import { serializeError } from "../serialize-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("lookup failed", {
        code: "lookup_failed",
        context: { itemCode: "sku-1" },
        isRetryable: true,
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "lookup_failed",
        message: "lookup failed",
        context: { itemCode: "sku-1" },
        isRetryable: true,
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("excludes stack by default and includes it on request", () => {
      const err = new BaseError("test", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("omits stack property when stack is empty", () => {
      const err = new BaseError("test", { code: "test" })
      err.stack = ""

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes cause chain recursively", () => {
      const root = new Error("connection reset")
      const middle = new BaseError("lookup failed", { code: "lookup_failed", cause: root })
      const outer = new BaseError("batch failed", { code: "batch_failed", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("lookup_failed")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("connection reset")
    })

    it("omits cause property when undefined", () => {
      const err = new BaseError("no cause", { code: "test" })

      expect("cause" in serializeError(err)).toBe(false)
    })
  })

  describe("standard Error instances", () => {
    it("serializes with code unknown and non-operational", () => {
      const serialized = serializeError(new Error("unexpected"))

      expect(serialized.code).toBe("unknown")
      expect(serialized.isOperational).toBe(false)
      expect(serialized.isRetryable).toBe(false)
      expect(serialized.context).toEqual({})
    })

    it("preserves error subclass name", () => {
      expect(serializeError(new TypeError("not a function")).name).toBe("TypeError")
    })

    it("handles Error with cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("wraps string as message", () => {
      const serialized = serializeError("something went wrong")

      expect(serialized.message).toBe("something went wrong")
      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.context).toEqual({})
    })

    it("wraps other values in context.value", () => {
      const obj = { price: -1 }
      const serialized = serializeError(obj)

      expect(serialized.context).toEqual({ value: obj })
      expect(serialized.message).toBe("Unknown error")
      expect(serialized.isOperational).toBe(false)
    })

    it("handles null and undefined", () => {
      expect(serializeError(null).context).toEqual({ value: null })
      expect(serializeError(undefined).context).toEqual({ value: undefined })
    })
  })
})
