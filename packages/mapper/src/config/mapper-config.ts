import { z } from "zod"
import { type MapperSettings, mapperConfigSchema } from "./schema"

export const ENV_PREFIX = "ROWMAP_"

export type LoadMapperConfigOptions = {
  /** Default: process.env */
  env?: Record<string, string | undefined>
  /** Applied after the environment */
  overrides?: Partial<Record<keyof MapperSettings, unknown>>
}

/**
 * Validated mapper settings plus where each value came from.
 */
export class MapperConfig {
  constructor(
    private readonly data: Readonly<MapperSettings>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<MapperSettings> {
    return this.data
  }

  /** "env", "overrides" or "default" */
  explain(key: keyof MapperSettings): string {
    return this.provenance[key] ?? "default"
  }

  /** Keys that were provided but are not settings, e.g. misspelled env vars */
  unknownKeys(): string[] {
    return [...this.providedKeys].filter((key) => !(key in this.data))
  }
}

/**
 * Load mapper settings from `ROWMAP_*` environment variables and overrides.
 *
 * @example
 * ```ts
 * const config = loadMapperConfig({ overrides: { LOG_LEVEL: "debug" } })
 * const mapper = createColumnMapper(config.value)
 * ```
 *
 * @throws Error listing every invalid setting
 */
export function loadMapperConfig(options: LoadMapperConfigOptions = {}): MapperConfig {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  const sources: [name: string, values: Record<string, unknown>][] = [
    ["env", fromEnv(options.env ?? process.env)],
    ["overrides", { ...options.overrides }],
  ]

  for (const [name, values] of sources) {
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = name
      }
    }
  }

  const result = mapperConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  return new MapperConfig(result.data, provenance, new Set(Object.keys(merged)))
}

function fromEnv(env: Record<string, string | undefined>): Record<string, string | undefined> {
  const filtered: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX)) {
      filtered[key.slice(ENV_PREFIX.length)] = value
    }
  }

  return filtered
}
