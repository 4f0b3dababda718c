/**
 * Syntax dialects a configuration source can be written in.
 */
export const ConfigSyntax = {
  /** Strict JSON. */
  Json: "json",
  /** HOCON, a JSON superset with comments, includes and substitutions. */
  Conf: "conf",
  /** Java-style `.properties`, where dotted keys become nested paths. */
  Properties: "properties",
} as const

export type ConfigSyntax = (typeof ConfigSyntax)[keyof typeof ConfigSyntax]

export const configSyntaxes: readonly ConfigSyntax[] = Object.values(ConfigSyntax)

export function isConfigSyntax(value: unknown): value is ConfigSyntax {
  return configSyntaxes.some((syntax) => syntax === value)
}
