import { type ConfigError, createError, serializeError } from "@confkit/errors"
import { createNullLogger, type Logger } from "@confkit/logger"
import { z } from "zod"
import { EnvSettingsSource } from "../../adapters/settings/env-settings-source"
import { ConfigSyntax } from "../../ports/config-syntax"
import type { SettingsSource } from "../../ports/settings-source"
import { ParseOptions } from "../parse-options"

const booleanSetting = z.union([
  z.boolean(),
  z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(["true", "false", "1", "0"]))
    .transform((v) => v === "true" || v === "1"),
])

export const parseSettingsSchema = z.object({
  SYNTAX: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum([ConfigSyntax.Json, ConfigSyntax.Conf, ConfigSyntax.Properties]))
    .optional(),
  ORIGIN: z.string().min(1).optional(),
  ALLOW_MISSING: booleanSetting.optional(),
})

export type ParseSettings = z.infer<typeof parseSettingsSchema>

const settingKeys: ReadonlySet<string> = new Set(Object.keys(parseSettingsSchema.shape))

export type LoadParseOptionsOptions = {
  /** @default [new EnvSettingsSource()] */
  sources?: SettingsSource[]

  /** Options the settings are applied to. @default ParseOptions.defaults() */
  base?: ParseOptions

  logger?: Logger
}

/**
 * Build parse options from external settings.
 *
 * @throws ConfigError with code `invalid_settings` when a value does not validate
 */
export async function loadParseOptions({
  sources,
  base = ParseOptions.defaults(),
  logger = createNullLogger(),
}: LoadParseOptionsOptions = {}): Promise<ParseOptions> {
  const log = logger.child({ module: "parse-options" })
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSettingsSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = parseSettingsSchema.safeParse(merged)

  if (!result.success) {
    const error = invalidSettings(result.error, provenance)

    log.error("parse settings rejected", { error: serializeError(error) })
    throw error
  }

  const unknownKeys = Object.keys(merged).filter((key) => !settingKeys.has(key))
  if (unknownKeys.length > 0) {
    log.warn("ignoring unknown parse settings", { keys: unknownKeys })
  }

  const settings = result.data
  let options = base

  if (settings.SYNTAX !== undefined) options = options.withSyntax(settings.SYNTAX)
  if (settings.ORIGIN !== undefined) options = options.withOriginDescription(settings.ORIGIN)
  if (settings.ALLOW_MISSING !== undefined) {
    options = options.withAllowMissing(settings.ALLOW_MISSING)
  }

  log.debug("parse settings applied", { settings, provenance })

  return options
}

function invalidSettings(
  error: z.ZodError,
  provenance: Record<string, string>,
): ConfigError<"invalid_settings"> {
  const keys = [...new Set(error.issues.map((issue) => String(issue.path[0])))]

  return createError(
    "invalid_settings",
    `Parse settings validation failed:\n${z.prettifyError(error)}`,
    { context: { keys, sources: keys.map((key) => provenance[key] ?? "unknown") } },
  )
}
