import { EnvSource, ObjectSource, loadConfig } from "@enrkit/config"
import { createNullLogger, type Logger } from "@enrkit/logger"
import { type EntryConfig, type EnvConfig, envPrefixes, envSchema } from "./schema"

export type LoadEntryConfigOptions = {
  env?: Record<string, string | undefined>
  /** Applied on top of `env`, keyed by variable name */
  overrides?: Record<string, unknown>
  logger?: Logger
}

function isSetting(key: string): key is keyof EnvConfig {
  return Object.hasOwn(envSchema.shape, key)
}

export function mapEnvToConfig(env: EnvConfig): EntryConfig {
  return {
    maxSize: env.ENR_MAX_SIZE,
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

/**
 * Loads entry settings from the environment and overrides.
 *
 * Logs where each setting came from at debug, and warns about `ENR_*` and
 * `LOG_*` names the schema does not define, which are usually typos.
 */
export async function loadEntryConfig({
  env = process.env,
  overrides = {},
  logger = createNullLogger(),
}: LoadEntryConfigOptions = {}): Promise<EntryConfig> {
  const log = logger.child({ module: "config" })

  const config = await loadConfig({
    schema: envSchema,
    sources: [new EnvSource({ env }), new ObjectSource(overrides)],
  })

  for (const key of Object.keys(envSchema.shape).filter(isSetting)) {
    log.debug("config value", { key, source: config.explain(key) })
  }

  for (const key of config.unknownKeys(envPrefixes)) {
    log.warn("unknown config key", { key })
  }

  return mapEnvToConfig(config.value)
}
