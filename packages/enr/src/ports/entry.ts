/**
 * A typed field that can be stored in a node record.
 *
 * `key` is part of the wire contract and never changes for a given type
 * (the generic IP entry is the one exception: it picks "ip" or "ip6" from its
 * value). `encode` returns exactly one RLP item, which the record stores
 * under `key`.
 */
export interface Entry {
  /** Discriminant used to dispatch over known entry types */
  readonly kind: string
  readonly key: string
  encode(): Uint8Array
}

/**
 * The static side of an entry type: the key to look up and how to rebuild
 * the entry from the bytes stored under it.
 *
 * @example
 * ```ts
 * const tcp = entries.load(TCP) // TCP satisfies EntryType<TCP>
 * ```
 */
export interface EntryType<E extends Entry> {
  readonly key: string
  decode(input: Uint8Array): E
}

/**
 * An entry that decodes into caller-owned storage instead of returning a
 * new value.
 */
export interface InPlaceEntry extends Entry {
  decode(input: Uint8Array): void
}
