/**
 * Locates resources named by the parser or by include directives, the way a
 * classpath or module resolver would.
 */
export interface LoadContext {
  /** Used in log lines and origin descriptions. */
  readonly name: string

  /**
   * Map a resource name to a location.
   *
   * Returns undefined when the resource is not visible from this context.
   */
  resolve(resource: string): string | undefined
}
