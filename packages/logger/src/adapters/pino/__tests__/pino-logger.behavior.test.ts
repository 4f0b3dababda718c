import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("writes JSON lines with the bound context", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { module: "settings" })

    logger.info("applied", { origin: "app.conf" })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({ msg: "applied", module: "settings", origin: "app.conf" })
    expect(payload.level).toBe(30)
    expect(typeof payload.time).toBe("number")
  })

  it("child() writes through the parent's destination and level", () => {
    const { lines, destination } = makeLineDestination()

    const child = new PinoLogger({ destination }, { level: "warn" }).child({ source: "env" })

    child.info("ignored")
    child.warn("kept")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ msg: "kept", source: "env" })
  })

  it("serializes errors under err with their message", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })

    logger.error("failed", { err: new Error("boom") })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err).toMatchObject({ type: "Error", message: "boom" })
  })
})
