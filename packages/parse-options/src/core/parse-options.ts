import type { ConfigSyntax } from "../ports/config-syntax"
import type { Includer } from "../ports/includer"
import type { LoadContext } from "../ports/load-context"
import { InvalidArgumentError } from "./errors"
import { currentLoadContext } from "./load-context/ambient-load-context"

/**
 * Separator for path-style origin descriptions, `a->b->c` for `a.b.c`.
 */
export const PATH_TOKEN_SEPARATOR = "->"

/**
 * Options that tell a parser how to read one configuration source.
 *
 * Instances are frozen; every `with*` method returns a new instance, or the
 * receiver itself when the value does not change.
 *
 * @example
 * ```ts
 * const options = ParseOptions.defaults()
 *   .withSyntax(ConfigSyntax.Json)
 *   .withAllowMissing(false)
 * ```
 */
export class ParseOptions {
  private constructor(
    /**
     * Syntax to assume, or undefined to guess from the file extension and
     * fall back to `conf`.
     */
    readonly syntax: ConfigSyntax | undefined,
    /**
     * Basis of the origin attached to parsed values, or undefined to let the
     * loader derive one (usually the filename).
     */
    readonly originDescription: string | undefined,
    /**
     * Whether a missing source parses as an empty document. Applies to the
     * root source only, never to its includes.
     */
    readonly allowMissing: boolean,
    /** Custom include handling, or undefined for the loader's default. */
    readonly includer: Includer | undefined,
    private readonly loadContext: LoadContext | undefined,
  ) {
    Object.freeze(this)
  }

  static defaults(): ParseOptions {
    return new ParseOptions(undefined, undefined, true, undefined, undefined)
  }

  withSyntax(syntax: ConfigSyntax | undefined): ParseOptions {
    if (this.syntax === syntax) return this

    return new ParseOptions(
      syntax,
      this.originDescription,
      this.allowMissing,
      this.includer,
      this.loadContext,
    )
  }

  withOriginDescription(originDescription: string | undefined): ParseOptions {
    if (this.originDescription === originDescription) return this

    return new ParseOptions(
      this.syntax,
      originDescription,
      this.allowMissing,
      this.includer,
      this.loadContext,
    )
  }

  /**
   * Sets the origin description only if none is set yet, so a loader can
   * supply a filename without overriding the caller's own description.
   *
   * @internal
   */
  withFallbackOriginDescription(originDescription: string | undefined): ParseOptions {
    if (this.originDescription === undefined) {
      return this.withOriginDescription(originDescription)
    }
    return this
  }

  withAllowMissing(allowMissing: boolean): ParseOptions {
    if (this.allowMissing === allowMissing) return this

    return new ParseOptions(
      this.syntax,
      this.originDescription,
      allowMissing,
      this.includer,
      this.loadContext,
    )
  }

  withIncluder(includer: Includer | undefined): ParseOptions {
    if (this.includer === includer) return this

    return new ParseOptions(
      this.syntax,
      this.originDescription,
      this.allowMissing,
      includer,
      this.loadContext,
    )
  }

  /**
   * Put `includer` in front of the current one, which becomes its fallback
   * through `includer.withFallback(current)`.
   */
  prependIncluder(includer: Includer): ParseOptions {
    if (includer == null) {
      throw new InvalidArgumentError("null includer passed to prependIncluder", {
        operation: "prependIncluder",
      })
    }
    if (this.includer === includer) return this
    if (this.includer) return this.withIncluder(includer.withFallback(this.includer))

    return this.withIncluder(includer)
  }

  /**
   * Put `includer` behind the current one through `current.withFallback(includer)`.
   */
  appendIncluder(includer: Includer): ParseOptions {
    if (includer == null) {
      throw new InvalidArgumentError("null includer passed to appendIncluder", {
        operation: "appendIncluder",
      })
    }
    if (this.includer === includer) return this
    if (this.includer) return this.withIncluder(this.includer.withFallback(includer))

    return this.withIncluder(includer)
  }

  /**
   * @param loadContext a context, or undefined to use the ambient one at read time
   */
  withLoadContext(loadContext: LoadContext | undefined): ParseOptions {
    if (this.loadContext === loadContext) return this

    return new ParseOptions(
      this.syntax,
      this.originDescription,
      this.allowMissing,
      this.includer,
      loadContext,
    )
  }

  /**
   * The explicit load context, or the ambient one of the current async
   * execution context when none is set. The ambient context is looked up on
   * every call and never stored.
   */
  getLoadContext(): LoadContext {
    return this.loadContext ?? currentLoadContext()
  }

  /** Whether a load context was set explicitly. */
  hasLoadContext(): boolean {
    return this.loadContext !== undefined
  }
}
