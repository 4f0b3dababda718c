import type { LoadContext } from "../../ports/load-context"

/**
 * Resolves resources from a fixed name-to-location table.
 */
export class MemoryLoadContext implements LoadContext {
  private readonly locations: ReadonlyMap<string, string>

  constructor(
    readonly name: string,
    locations: Readonly<Record<string, string>> = {},
  ) {
    this.locations = new Map(Object.entries(locations))
  }

  resolve(resource: string): string | undefined {
    return this.locations.get(resource)
  }
}
