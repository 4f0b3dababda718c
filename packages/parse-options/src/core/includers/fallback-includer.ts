import type { IncludeContext } from "../../ports/include-context"
import type { Includer, IncludeResult } from "../../ports/includer"

/**
 * Two includers chained: `primary` is always consulted first, `fallback` only
 * for what `primary` defers. Errors thrown by `primary` are not caught.
 */
export class FallbackIncluder implements Includer {
  readonly name: string

  constructor(
    readonly primary: Includer,
    readonly fallback: Includer,
  ) {
    this.name = `${primary.name} -> ${fallback.name}`
  }

  include(context: IncludeContext, what: string): IncludeResult {
    const result = this.primary.include(context, what)

    if (result.kind === "deferred") {
      return this.fallback.include(context, what)
    }
    return result
  }

  withFallback(fallback: Includer): Includer {
    return new FallbackIncluder(this, fallback)
  }
}
