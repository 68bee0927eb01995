import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  readonly value: Readonly<T>
  private readonly origin: ReadonlyMap<string, string>
  private readonly supplied: readonly string[]

  /**
   * @param origin - winning source name per supplied key
   * @param supplied - every key any source supplied, known to the schema or not
   */
  constructor(value: T, origin: ReadonlyMap<string, string>, supplied: Iterable<string>) {
    this.value = Object.freeze({ ...value })
    this.origin = origin
    this.supplied = [...new Set(supplied)]
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.value[key]
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.origin.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.keys(this.value).map((key) => this.origin.get(key) ?? "default"))]
  }

  unknownKeys(prefixes: readonly string[] = []): string[] {
    return this.supplied
      .filter((key) => !Object.hasOwn(this.value, key))
      .filter((key) => prefixes.length === 0 || prefixes.some((p) => key.startsWith(p)))
      .sort()
  }
}
