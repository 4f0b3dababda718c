import type { IncludeContext } from "../../ports/include-context"
import type { IncludedValue, Includer, IncludeResult } from "../../ports/includer"
import { FallbackIncluder } from "./fallback-includer"

/**
 * A single includer. Subclasses implement `include`; chaining is shared.
 */
export abstract class BaseIncluder implements Includer {
  constructor(readonly name: string) {}

  abstract include(context: IncludeContext, what: string): IncludeResult

  withFallback(fallback: Includer): Includer {
    return new FallbackIncluder(this, fallback)
  }

  protected included(value: IncludedValue): IncludeResult {
    return { kind: "included", value, includer: this.name }
  }

  protected deferred(): IncludeResult {
    return { kind: "deferred" }
  }
}
