import { type LogLevelName, logLevelNames } from "@enrkit/logger"
import { z } from "zod/mini"

/** Prefixes of the settings this package owns; other names in the environment are ignored. */
export const envPrefixes = ["ENR_", "LOG_"] as const

export const envSchema = z.object({
  SERVICE_NAME: z._default(z.string(), "enr"),

  ENR_MAX_SIZE: z._default(z.pipe(z.coerce.number(), z.int().check(z.positive())), 300),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type EntryConfig = {
  maxSize: number

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
