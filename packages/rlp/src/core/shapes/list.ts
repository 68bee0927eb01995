import type { RlpShape } from "../../ports/shape"
import { RlpError } from "../rlp-error"

/** A homogeneous list; each element uses `of`. */
export function list<T>(of: RlpShape<T>): RlpShape<readonly T[]> {
  const name = `list<${of.name}>`

  return {
    name,
    toItem: (values) => values.map((v) => of.toItem(v)),
    fromItem(item) {
      if (item instanceof Uint8Array) {
        throw new RlpError("rlp_expected_list", `rlp: expected input list for ${name}`, {
          context: { shape: name },
        })
      }
      return item.map((child) => of.fromItem(child))
    },
  }
}
