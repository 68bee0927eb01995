import { decode, encode, type RlpShape } from "@enrkit/rlp"
import type { InPlaceEntry } from "../../ports/entry"
import { EntryError } from "../errors/entry-error"

/** Caller-owned storage that a generic entry reads from and decodes into. */
export type Ref<T> = { current: T }

export function ref<T>(value: T): Ref<T> {
  return { current: value }
}

/**
 * Any codec-compatible value under an arbitrary key.
 *
 * The value lives in `slot`, so `decode` updates the caller's storage
 * directly; there is no way to build one that decodes into a copy.
 */
export class GenericEntry<T> implements InPlaceEntry {
  readonly kind = "generic"

  constructor(
    readonly key: string,
    readonly slot: Ref<T>,
    readonly shape: RlpShape<T>,
  ) {
    if (key.length === 0) {
      throw new EntryError("invalid_entry_key", "invalid entry key: key must not be empty", {
        shape: shape.name,
      })
    }
  }

  encode(): Uint8Array {
    return encode(this.shape, this.slot.current)
  }

  decode(input: Uint8Array): void {
    this.slot.current = decode(this.shape, input)
  }
}

/**
 * Wraps a value with a key name so it can be set in, and loaded from, a
 * record without a dedicated entry type.
 *
 * @example
 * ```ts
 * const eth = ref<readonly number[]>([])
 * entries.loadInto(withEntry("eth", eth, list(uint32)))
 * eth.current // decoded value
 * ```
 */
export function withEntry<T>(key: string, slot: Ref<T>, shape: RlpShape<T>): GenericEntry<T> {
  return new GenericEntry(key, slot, shape)
}
