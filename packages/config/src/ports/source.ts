/**
 * Supplies raw settings by name. Sources never validate; `loadConfig` merges
 * them in order (later wins) and validates the result. A value of
 * `undefined` means the source has nothing for that name.
 */
export interface ConfigSource {
  /** Recorded as the provenance of every value this source wins, e.g. "env:NODE_" */
  readonly name: string
  load(): Promise<Record<string, unknown>>
}
