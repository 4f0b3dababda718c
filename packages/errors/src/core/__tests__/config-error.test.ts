import { ConfigError, serializeError } from "../config-error"

describe("ConfigError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2025-03-02T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("carries message and code", () => {
      const err = new ConfigError("bad includer", { code: "invalid_argument" })

      expect(err.message).toBe("bad includer")
      expect(err.code).toBe("invalid_argument")
      expect(err.name).toBe("ConfigError")
    })

    it("defaults to an empty frozen context", () => {
      const err = new ConfigError("x", { code: "x" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults isOperational to true", () => {
      const err = new ConfigError("x", { code: "x" })

      expect(err.isOperational).toBe(true)
    })

    it("copies and freezes the given context", () => {
      const context = { option: "includer" }
      const err = new ConfigError("x", { code: "x", context })

      context.option = "changed"

      expect(err.context).toEqual({ option: "includer" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("root")
      const err = new ConfigError("wrapped", { code: "x", cause })

      expect(err.cause).toBe(cause)
    })

    it("stamps the current time", () => {
      const err = new ConfigError("x", { code: "x" })

      expect(err.timestamp).toEqual(new Date("2025-03-02T08:00:00.000Z"))
    })

    it("is an Error", () => {
      const err = new ConfigError("x", { code: "x" })

      expect(err).toBeInstanceOf(Error)
      expect(err.stack).toContain("ConfigError")
    })

    it("names subclasses after themselves", () => {
      class MissingSourceError extends ConfigError<"missing_source"> {}

      const err = new MissingSourceError("gone", { code: "missing_source" })

      expect(err.name).toBe("MissingSourceError")
    })
  })

  describe("toJSON", () => {
    it("serializes code, context and timestamp", () => {
      const err = new ConfigError("bad value", {
        code: "invalid_settings",
        context: { key: "SYNTAX" },
      })

      expect(err.toJSON()).toEqual({
        name: "ConfigError",
        code: "invalid_settings",
        message: "bad value",
        context: { key: "SYNTAX" },
        isOperational: true,
        timestamp: "2025-03-02T08:00:00.000Z",
      })
    })
  })
})

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2025-03-02T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes a plain Error as non-operational with code unknown", () => {
    expect(serializeError(new TypeError("nope"))).toEqual({
      name: "TypeError",
      code: "unknown",
      message: "nope",
      context: {},
      isOperational: false,
      timestamp: "2025-03-02T08:00:00.000Z",
    })
  })

  it("serializes the cause chain", () => {
    const err = new ConfigError("outer", { code: "outer", cause: new Error("inner") })

    const serialized = serializeError(err)

    expect(serialized.cause?.message).toBe("inner")
    expect(serialized.cause?.code).toBe("unknown")
  })

  it("wraps non-error values", () => {
    expect(serializeError("boom")).toMatchObject({
      name: "NonErrorThrown",
      message: "boom",
      context: { value: "boom" },
    })
    expect(serializeError(42).message).toBe("Unknown error")
  })

  it("includes the stack only when asked", () => {
    const err = new ConfigError("x", { code: "x" })

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toBe(err.stack)
  })
})
