import { ethersItemCodec } from "../adapters/ethers/ethers-item-codec"
import type { ItemCodec } from "../ports/item-codec"
import type { RlpItem } from "../ports/rlp-item"
import type { RlpShape } from "../ports/shape"

export function encodeItem(item: RlpItem, items: ItemCodec = ethersItemCodec): Uint8Array {
  return items.encode(item)
}

export function decodeItem(bytes: Uint8Array, items: ItemCodec = ethersItemCodec): RlpItem {
  return items.decode(bytes)
}

/** Encode `value` as a single RLP item according to `shape`. */
export function encode<T>(shape: RlpShape<T>, value: T, items: ItemCodec = ethersItemCodec): Uint8Array {
  return items.encode(shape.toItem(value))
}

/**
 * Decode exactly one RLP item from `bytes` according to `shape`.
 *
 * @throws RlpError when the input is malformed, non-canonical, carries
 * trailing data, or does not fit the shape.
 */
export function decode<T>(shape: RlpShape<T>, bytes: Uint8Array, items: ItemCodec = ethersItemCodec): T {
  return shape.fromItem(items.decode(bytes))
}
