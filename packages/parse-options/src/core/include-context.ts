import path from "node:path"
import type { IncludeContext } from "../ports/include-context"
import type { ParseOptions } from "./parse-options"

/**
 * Options for an included source: syntax and origin are re-derived from the
 * included name, and `allowMissing` is reset since it only governs the root.
 */
export function clearForInclude(options: ParseOptions): ParseOptions {
  return options.withSyntax(undefined).withOriginDescription(undefined).withAllowMissing(true)
}

export type CreateIncludeContextOptions = {
  /** Options of the including source. */
  options: ParseOptions

  /** Location of the including source, e.g. "conf/app.conf". */
  location?: string
}

export function createIncludeContext({
  options,
  location,
}: CreateIncludeContextOptions): IncludeContext {
  const includeOptions = clearForInclude(options)

  return {
    relativeTo(name: string): string | undefined {
      if (location === undefined || path.posix.isAbsolute(name)) return undefined

      return path.posix.join(path.posix.dirname(location), name)
    },
    parseOptions(): ParseOptions {
      return includeOptions
    },
  }
}
