import { createPinoLogger, type PinoLoggerDeps } from "@enrkit/logger"
import type { EntryConfig } from "./config/schema"
import { EntryMap } from "./core/entry-map"

export function createEntryMap(config: EntryConfig, loggerDeps: PinoLoggerDeps = {}): EntryMap {
  const logger = createPinoLogger(
    loggerDeps,
    { level: config.logging.level, prettify: config.logging.prettify },
    { service: config.logging.serviceName },
  )

  return new EntryMap({ maxSize: config.maxSize, logger })
}
