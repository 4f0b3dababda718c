import { BaseIncluder } from "../../core/includers/base-includer"
import type { IncludeContext } from "../../ports/include-context"
import type { IncludedValue, Includer, IncludeResult } from "../../ports/includer"

/**
 * Returns the included document, or undefined to defer to the next includer.
 */
export type IncludeFn = (context: IncludeContext, what: string) => IncludedValue | undefined

class FunctionIncluder extends BaseIncluder {
  constructor(
    name: string,
    private readonly fn: IncludeFn,
  ) {
    super(name)
  }

  include(context: IncludeContext, what: string): IncludeResult {
    const value = this.fn(context, what)

    return value === undefined ? this.deferred() : this.included(value)
  }
}

/**
 * @example
 * ```ts
 * const secrets = createIncluder("secrets", (_ctx, what) =>
 *   what.startsWith("secret:") ? vault.read(what.slice(7)) : undefined,
 * )
 * options = options.prependIncluder(secrets)
 * ```
 */
export function createIncluder(name: string, fn: IncludeFn): Includer {
  return new FunctionIncluder(name, fn)
}
