import type { IncludeContext } from "./include-context"

export type IncludedValue = Readonly<Record<string, unknown>>

/**
 * Outcome of asking one includer for a resource.
 *
 * `deferred` means "not mine, ask the next one"; an includer that fails
 * throws instead, and the chain stops there.
 */
export type IncludeResult =
  | { readonly kind: "included"; readonly value: IncludedValue; readonly includer: string }
  | { readonly kind: "deferred" }

export interface Includer {
  readonly name: string

  /**
   * Resolve the include directive `what` (e.g. `include "db.conf"`).
   */
  include(context: IncludeContext, what: string): IncludeResult

  /**
   * Chain `fallback` after this includer: the result consults this includer
   * first and asks `fallback` only for what this one defers.
   */
  withFallback(fallback: Includer): Includer
}
