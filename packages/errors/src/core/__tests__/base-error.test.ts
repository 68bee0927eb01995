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
      const err = new BaseError("bad width", { code: "invalid_width" })

      expect(err.message).toBe("bad width")
      expect(err.code).toBe("invalid_width")
    })

    it("sets name to constructor name", () => {
      class WidthError extends BaseError<"invalid_width"> {}

      expect(new BaseError("test", { code: "test" }).name).toBe("BaseError")
      expect(new WidthError("test", { code: "invalid_width" }).name).toBe("WidthError")
    })

    it("defaults context to an empty frozen object", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults isOperational to true", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isOperational).toBe(true)
    })

    it("sets timestamp to current time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("copies and freezes context", () => {
      const context = { key: "ip", length: 5 }
      const err = new BaseError("test", { code: "test", context })

      expect(err.context).toEqual({ key: "ip", length: 5 })
      expect(err.context).not.toBe(context)
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("root cause")
      const err = new BaseError("wrapped", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })

    it("has no own cause when none is given", () => {
      const err = new BaseError("test", { code: "test" })

      expect("cause" in err).toBe(false)
    })

    it("accepts isOperational", () => {
      const err = new BaseError("invariant", { code: "bug", isOperational: false })

      expect(err.isOperational).toBe(false)
    })

    it("has a stack trace", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.stack).toContain("BaseError")
    })
  })

  describe("type safety", () => {
    it("preserves generic code type", () => {
      type WireCode = "rlp_malformed" | "rlp_wrong_size"
      const err = new BaseError<WireCode>("short", { code: "rlp_wrong_size" })

      const code: WireCode = err.code
      expect(code).toBe("rlp_wrong_size")
    })
  })

  describe("inheritance", () => {
    it("is instanceof Error and BaseError", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(BaseError)
    })
  })

  describe("toJSON", () => {
    it("returns serialized error", () => {
      const err = new BaseError("test error", {
        code: "test",
        context: { key: "tcp" },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "test",
        message: "test error",
        context: { key: "tcp" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
