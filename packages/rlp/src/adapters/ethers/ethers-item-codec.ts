import {
  decodeRlp,
  encodeRlp,
  getBytes,
  hexlify,
  type RlpStructuredData,
  type RlpStructuredDataish,
} from "ethers"
import { RlpError } from "../../core/rlp-error"
import type { ItemCodec } from "../../ports/item-codec"
import type { RlpItem } from "../../ports/rlp-item"

function toEthers(item: RlpItem): RlpStructuredDataish {
  if (item instanceof Uint8Array) return item
  return item.map(toEthers)
}

function fromEthers(data: RlpStructuredData): RlpItem {
  if (typeof data === "string") return getBytes(data)
  return data.map(fromEthers)
}

/**
 * ItemCodec backed by the ethers RLP primitives.
 *
 * ethers accepts long-form size prefixes for short payloads; canonical form is
 * checked here by re-encoding the decoded value and comparing with the input.
 */
export const ethersItemCodec: ItemCodec = {
  encode(item) {
    return getBytes(encodeRlp(toEthers(item)))
  },

  decode(bytes) {
    let decoded: RlpStructuredData
    try {
      decoded = decodeRlp(bytes)
    } catch (err) {
      throw new RlpError("rlp_malformed", "rlp: malformed input", {
        context: { input: bytes },
        cause: err,
      })
    }

    if (encodeRlp(decoded) !== hexlify(bytes)) {
      throw new RlpError("rlp_non_canonical_size", "rlp: non-canonical size information", {
        context: { input: bytes },
      })
    }

    return fromEthers(decoded)
  },
}
