import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"
import type { LoggerOptions } from "../logger-options"

export type CapturedLog = {
  level: LogLevelName
  payload: Record<string, unknown>
}

export type LoggerHarness = {
  name: string
  make: (opts?: Partial<LoggerOptions>) => {
    logger: Logger
    read: () => CapturedLog[]
    clear: () => void
  }
}
