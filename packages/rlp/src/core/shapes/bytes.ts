import type { RlpItem } from "../../ports/rlp-item"
import type { RlpShape } from "../../ports/shape"
import { RlpError } from "../rlp-error"

export function expectBytes(item: RlpItem, shape: string): Uint8Array {
  if (!(item instanceof Uint8Array)) {
    throw new RlpError("rlp_expected_bytes", `rlp: expected input string or byte for ${shape}`, {
      context: { shape },
    })
  }
  return item
}

/** A byte string of any length. */
export const bytes: RlpShape<Uint8Array> = {
  name: "bytes",
  toItem: (value) => Uint8Array.from(value),
  fromItem: (item) => Uint8Array.from(expectBytes(item, "bytes")),
}

/**
 * A byte string of exactly `width` bytes, in both directions.
 * Anything shorter or longer fails with `rlp_wrong_size`.
 */
export function fixedBytes(width: number): RlpShape<Uint8Array> {
  const name = `bytes${width}`

  const check = (value: Uint8Array): Uint8Array => {
    if (value.length !== width) {
      throw new RlpError(
        "rlp_wrong_size",
        `rlp: input value has wrong size ${value.length}, want ${width}`,
        { context: { shape: name, size: value.length, want: width } },
      )
    }
    return Uint8Array.from(value)
  }

  return {
    name,
    toItem: check,
    fromItem: (item) => check(expectBytes(item, name)),
  }
}
