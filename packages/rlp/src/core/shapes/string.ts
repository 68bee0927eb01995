import { toUtf8Bytes, toUtf8String } from "ethers"
import type { RlpShape } from "../../ports/shape"
import { RlpError } from "../rlp-error"
import { expectBytes } from "./bytes"

/**
 * A UTF-8 string stored as a byte string. Both directions are strict: text
 * with unpaired surrogates does not encode and malformed UTF-8 does not decode.
 */
export const string: RlpShape<string> = {
  name: "string",

  toItem(value) {
    try {
      return toUtf8Bytes(value)
    } catch (err) {
      throw new RlpError("rlp_invalid_utf8", "rlp: string is not valid UTF-16 text", {
        context: { length: value.length },
        cause: err,
      })
    }
  },

  fromItem(item) {
    const b = expectBytes(item, "string")
    try {
      return toUtf8String(b)
    } catch (err) {
      throw new RlpError("rlp_invalid_utf8", "rlp: string is not valid UTF-8", {
        context: { input: b },
        cause: err,
      })
    }
  },
}
