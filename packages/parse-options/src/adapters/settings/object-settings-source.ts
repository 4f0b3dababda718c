import type { SettingsSource } from "../../ports/settings-source"

export class ObjectSettingsSource implements SettingsSource {
  constructor(
    private readonly values: Record<string, unknown>,
    readonly name = "object",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
