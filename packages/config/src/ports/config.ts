/**
 * Validated settings plus where each one came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({ schema, sources: [new EnvSource()] })
 *
 * config.get("ENR_MAX_SIZE")     // 300
 * config.explain("ENR_MAX_SIZE") // "default"
 * config.unknownKeys(["ENR_"])   // ["ENR_MAX_SZE"]
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /** Name of the source whose value won, or "default" when the schema filled it in. */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct provenances across all schema keys, "default" included. */
  sourcesUsed(): string[]

  /**
   * Names a source supplied that the schema does not define, sorted. With
   * `prefixes`, only names starting with one of them; this keeps a whole
   * process environment from flooding the result.
   */
  unknownKeys(prefixes?: readonly string[]): string[]
}
