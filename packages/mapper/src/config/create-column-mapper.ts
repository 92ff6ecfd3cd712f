import { type Codec, BestFitCodec, SERIALIZE_AS_STRING } from "@rowmap/codec"
import { type PinoLoggerDeps, PinoLogger } from "@rowmap/logger"
import { ColumnMapper } from "../core/column-mapper"
import type { MapperSettings } from "./schema"

export type CreateColumnMapperDeps = {
  /** Replaces the BestFitCodec built from settings */
  codec?: Codec
  destination?: PinoLoggerDeps["destination"]
}

/**
 * Build a ColumnMapper with a pino logger and a codec configured from settings.
 */
export function createColumnMapper(
  settings: Readonly<MapperSettings>,
  deps: CreateColumnMapperDeps = {},
): ColumnMapper {
  const logger = new PinoLogger(
    deps.destination === undefined ? {} : { destination: deps.destination },
    { level: settings.LOG_LEVEL, prettify: settings.LOG_PRETTY },
    { service: settings.SERVICE_NAME, env: settings.APP_ENV },
  )

  const codec =
    deps.codec ??
    new BestFitCodec({
      defaultFlags: settings.SERIALIZE_AS_STRING ? { [SERIALIZE_AS_STRING]: "true" } : {},
    })

  return new ColumnMapper({ codec, logger })
}
