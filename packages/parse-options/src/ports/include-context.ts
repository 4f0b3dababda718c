import type { ParseOptions } from "../core/parse-options"

/**
 * What an includer knows about the source that contains the directive.
 */
export interface IncludeContext {
  /**
   * `name` resolved against the including source's location, or undefined
   * when that source has no location or `name` is already absolute.
   */
  relativeTo(name: string): string | undefined

  /** Options for parsing the included source. */
  parseOptions(): ParseOptions
}
