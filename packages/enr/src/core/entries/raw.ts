import { decodeItem, type RlpItem } from "@enrkit/rlp"
import type { Entry } from "../../ports/entry"
import { EntryError } from "../errors/entry-error"

/**
 * An entry under a key this package has no type for, kept as its encoded
 * bytes. The bytes must hold exactly one canonical RLP item.
 */
export class RawEntry implements Entry {
  readonly kind = "raw"
  readonly raw: Uint8Array

  constructor(
    readonly key: string,
    raw: Uint8Array,
  ) {
    if (key.length === 0) {
      throw new EntryError("invalid_entry_key", "invalid entry key: key must not be empty")
    }
    decodeItem(raw)
    this.raw = Uint8Array.from(raw)
  }

  encode(): Uint8Array {
    return Uint8Array.from(this.raw)
  }

  item(): RlpItem {
    return decodeItem(this.raw)
  }
}
