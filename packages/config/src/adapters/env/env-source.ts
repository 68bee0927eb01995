import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with this prefix are read; the prefix is stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Reads configuration from environment variables.
 *
 * Blank values (empty or whitespace only) count as unset, so a variable
 * exported as `ENR_MAX_SIZE=` falls through to the next source or the
 * schema default. Other values are trimmed.
 */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const [key, raw] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix)) continue

      const value = raw?.trim()
      if (value) values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
