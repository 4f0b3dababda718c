import type { SettingsSource } from "../../ports/settings-source"

export type EnvSettingsSourceOptions = {
  /** @default "CONFKIT_" */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Reads prefixed environment variables, `CONFKIT_SYNTAX=json` becomes `SYNTAX`.
 */
export class EnvSettingsSource implements SettingsSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSettingsSourceOptions = {}) {
    this.prefix = options.prefix ?? "CONFKIT_"
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return filtered
  }
}
