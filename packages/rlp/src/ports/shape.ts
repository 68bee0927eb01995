import type { RlpItem } from "./rlp-item"

/**
 * Describes how a TypeScript value maps onto an RLP item.
 *
 * Shapes are pure and compose: `list(string)` is a shape built from the
 * `string` shape. `fromItem` validates as it converts and throws `RlpError`
 * on anything the value type cannot represent.
 *
 * @example
 * ```ts
 * const port = decode(uint(16), encode(uint(16), 30303)) // 30303
 * ```
 */
export interface RlpShape<T> {
  /** Name used in error messages, e.g. "uint16" or "list<string>" */
  readonly name: string

  toItem(value: T): RlpItem
  fromItem(item: RlpItem): T
}

export type ShapeValue<S> = S extends RlpShape<infer T> ? T : never
