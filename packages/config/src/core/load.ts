import { BaseError } from "@enrkit/errors"
import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: z.core.$ZodType<T>
  /** Merged in order; later sources override earlier ones. Default: the process environment */
  sources?: readonly ConfigSource[]
}

/** The merged settings do not satisfy the schema; `issues` is zod's readable report. */
export class ConfigValidationError extends BaseError<"config_invalid"> {
  readonly issues: string

  constructor(issues: string) {
    super(`Configuration validation failed:\n${issues}`, {
      code: "config_invalid",
      context: { issues },
    })
    this.issues = issues
  }
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const origin = new Map<string, string>()

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      merged[key] = value
      origin.set(key, source.name)
    }
  }

  const result = z.safeParse(schema, merged)
  if (!result.success) {
    throw new ConfigValidationError(z.prettifyError(result.error))
  }

  return new Config(result.data, origin, Object.keys(merged))
}
