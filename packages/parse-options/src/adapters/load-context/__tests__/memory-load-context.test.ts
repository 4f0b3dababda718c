import { MemoryLoadContext } from "../memory-load-context"

describe("MemoryLoadContext", () => {
  it("resolves names from its table", () => {
    const context = new MemoryLoadContext("fixtures", { "db.conf": "/virtual/db.conf" })

    expect(context.name).toBe("fixtures")
    expect(context.resolve("db.conf")).toBe("/virtual/db.conf")
    expect(context.resolve("other.conf")).toBeUndefined()
  })
})
