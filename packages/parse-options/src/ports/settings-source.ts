/**
 * A source of raw parse settings (SYNTAX, ORIGIN, ALLOW_MISSING).
 *
 * Sources only load; validation happens once over the merged result.
 * Later sources override earlier ones, and undefined never overrides.
 */
export interface SettingsSource {
  /** e.g. "env", "object" */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
