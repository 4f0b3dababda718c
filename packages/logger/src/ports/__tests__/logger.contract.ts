import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds its own", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ module: "settings" }).child({ source: "env" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ module: "settings", source: "env" })
    })

    it("child() overrides on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ origin: "a.conf" }).child({ origin: "b.conf" }).info("hello")

      expect(read()[0]?.payload.origin).toBe("b.conf")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "settings" })
      const child = parent.child({ source: "env" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("source")
      expect(logs[1]?.payload).toMatchObject({ module: "settings", source: "env" })
    })

    it("per-call meta overrides context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ syntax: "conf" }).info("hello", { syntax: "json" })

      expect(read()[0]?.payload.syntax).toBe("json")
    })

    it("drops entries below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
