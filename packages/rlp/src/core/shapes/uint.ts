import type { RlpShape } from "../../ports/shape"
import { RlpError } from "../rlp-error"
import { expectBytes } from "./bytes"

const MAX_BITS = 48

/**
 * An unsigned integer of at most `bits` bits, encoded big-endian with no
 * leading zero bytes (zero is the empty string).
 *
 * `bits` must be a multiple of 8 no larger than 48 so every value stays a
 * safe JavaScript integer.
 */
export function uint(bits: number): RlpShape<number> {
  if (!Number.isInteger(bits) || bits <= 0 || bits % 8 !== 0 || bits > MAX_BITS) {
    throw new RangeError(`uint width must be a multiple of 8 in 8..${MAX_BITS}, got ${bits}`)
  }

  const name = `uint${bits}`
  const maxBytes = bits / 8
  const max = 2 ** bits - 1

  return {
    name,

    toItem(value) {
      if (!Number.isInteger(value) || value < 0 || value > max) {
        throw new RlpError("rlp_uint_out_of_range", `rlp: value ${value} out of range for ${name}`, {
          context: { shape: name, value },
        })
      }

      const out: number[] = []
      for (let v = value; v > 0; v = Math.floor(v / 256)) {
        out.unshift(v % 256)
      }
      return Uint8Array.from(out)
    },

    fromItem(item) {
      const b = expectBytes(item, name)

      if (b.length > maxBytes) {
        throw new RlpError("rlp_uint_overflow", `rlp: input string too long for ${name}`, {
          context: { shape: name, size: b.length },
        })
      }
      if (b[0] === 0) {
        throw new RlpError(
          "rlp_non_canonical_integer",
          `rlp: non-canonical integer (leading zero bytes) for ${name}`,
          { context: { shape: name, input: b } },
        )
      }

      return b.reduce((acc, byte) => acc * 256 + byte, 0)
    },
  }
}

export const uint8 = uint(8)
export const uint16 = uint(16)
export const uint32 = uint(32)
