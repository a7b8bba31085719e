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
      const err = new BaseError("Something went wrong", { code: "test_error" })

      expect(err.message).toBe("Something went wrong")
      expect(err.code).toBe("test_error")
      expect(err.name).toBe("BaseError")
    })

    it("applies defaults", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("keeps cause and flags", () => {
      const cause = new Error("root cause")
      const err = new BaseError("wrapped", {
        code: "test",
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("freezes a copy of the context", () => {
      const context = { method: "generateIntegers" }
      const err = new BaseError("test", { code: "test", context })

      expect(Object.isFrozen(err.context)).toBe(true)
      expect(err.context).not.toBe(context)
    })

    it("uses the subclass name", () => {
      class TimeoutError extends BaseError<"timeout"> {}

      const err = new TimeoutError("slow", { code: "timeout" })

      expect(err.name).toBe("TimeoutError")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
    })
  })

  describe("toJSON", () => {
    it("returns serialized error", () => {
      const err = new BaseError("test error", {
        code: "test",
        context: { id: 123 },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "test",
        message: "test error",
        context: { id: 123 },
        isRetryable: false,
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
