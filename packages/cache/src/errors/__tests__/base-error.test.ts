import { BaseError, serializeError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("applies defaults", () => {
      const err = new BaseError("something failed", { code: "test_error" })

      expect(err.message).toBe("something failed")
      expect(err.code).toBe("test_error")
      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("names the error after the concrete class", () => {
      class EndpointDown extends BaseError<"endpoint_down"> {}

      const err = new EndpointDown("down", { code: "endpoint_down" })

      expect(err.name).toBe("EndpointDown")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
    })

    it("keeps the cause", () => {
      const cause = new Error("ECONNREFUSED")
      const err = new BaseError("wrapped", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })

    it("freezes a copy of the context", () => {
      const context = { endpoint: "cfg.local:11211" }
      const err = new BaseError("test", { code: "test", context })

      context.endpoint = "changed"

      expect(err.context).toEqual({ endpoint: "cfg.local:11211" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new BaseError("discovery failed", {
        code: "test",
        context: { endpoint: "cfg.local:11211" },
        isRetryable: true,
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "test",
        message: "discovery failed",
        context: { endpoint: "cfg.local:11211" },
        isRetryable: true,
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes the cause chain", () => {
    const root = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" })
    const outer = new BaseError("outer", { code: "outer", cause: root })

    const serialized = serializeError(outer)

    expect(serialized.cause).toEqual({
      name: "Error",
      code: "unknown",
      message: "connect ECONNREFUSED",
      context: { code: "ECONNREFUSED" },
      isRetryable: false,
      isOperational: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("omits cause and stack unless present and requested", () => {
    const serialized = serializeError(new BaseError("plain", { code: "test" }))

    expect("cause" in serialized).toBe(false)
    expect("stack" in serialized).toBe(false)
  })

  it("includes the stack when asked", () => {
    const serialized = serializeError(new BaseError("plain", { code: "test" }), {
      includeStack: true,
    })

    expect(serialized.stack).toContain("plain")
  })

  it("wraps non-Error values", () => {
    expect(serializeError("boom")).toMatchObject({
      name: "NonErrorThrown",
      message: "boom",
      context: {},
    })
    expect(serializeError(42)).toMatchObject({
      name: "NonErrorThrown",
      message: "Unknown error",
      context: { value: 42 },
    })
  })
})
