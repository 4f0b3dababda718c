export {
  createIncluder,
  type IncludeFn,
} from "./adapters/includers/function-includer"
export { ObjectIncluder } from "./adapters/includers/object-includer"
export { MemoryLoadContext } from "./adapters/load-context/memory-load-context"
export {
  RootsLoadContext,
  type RootsLoadContextOptions,
} from "./adapters/load-context/roots-load-context"
export {
  EnvSettingsSource,
  type EnvSettingsSourceOptions,
} from "./adapters/settings/env-settings-source"
export { ObjectSettingsSource } from "./adapters/settings/object-settings-source"
export { InvalidArgumentError, type ParseOptionsErrorCode } from "./core/errors"
export {
  clearForInclude,
  type CreateIncludeContextOptions,
  createIncludeContext,
} from "./core/include-context"
export { BaseIncluder } from "./core/includers/base-includer"
export { FallbackIncluder } from "./core/includers/fallback-includer"
export { resolveInclude } from "./core/includers/resolve-include"
export {
  currentLoadContext,
  runWithLoadContext,
} from "./core/load-context/ambient-load-context"
export { PATH_TOKEN_SEPARATOR, ParseOptions } from "./core/parse-options"
export {
  type LoadParseOptionsOptions,
  loadParseOptions,
  type ParseSettings,
  parseSettingsSchema,
} from "./core/settings/load-parse-options"
export { ConfigSyntax, configSyntaxes, isConfigSyntax } from "./ports/config-syntax"
export type { IncludeContext } from "./ports/include-context"
export type { IncludedValue, Includer, IncludeResult } from "./ports/includer"
export type { LoadContext } from "./ports/load-context"
export type { SettingsSource } from "./ports/settings-source"
