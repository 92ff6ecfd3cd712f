import { logLevelNames } from "@rowmap/logger"
import { z } from "zod"

/** Accepts real booleans from overrides and "true"/"false"/"1"/"0" strings from the environment. */
const flag = z.union([z.boolean(), z.stringbool()])

export const mapperConfigSchema = z.object({
  SERVICE_NAME: z.string().min(1).default("rowmap"),
  APP_ENV: z.string().min(1).default("development"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
  /** Store numbers, booleans and dates as text instead of fixed-width binary */
  SERIALIZE_AS_STRING: flag.default(false),
})

export type MapperSettings = z.infer<typeof mapperConfigSchema>
