import type { IncludeContext } from "../../ports/include-context"
import type { IncludeResult } from "../../ports/includer"
import type { ParseOptions } from "../parse-options"

/**
 * Ask the includer chain configured on `options` for `what`. With no includer
 * set the directive is deferred to the loader's built-in handling.
 */
export function resolveInclude(
  options: ParseOptions,
  context: IncludeContext,
  what: string,
): IncludeResult {
  if (!options.includer) return { kind: "deferred" }

  return options.includer.include(context, what)
}
