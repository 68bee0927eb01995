import type { RlpItem } from "./rlp-item"

/**
 * Converts between RLP item trees and their wire bytes.
 *
 * @remarks
 * Implementations must reject input that is not exactly one canonical item:
 * truncated input, trailing bytes, and size prefixes longer than needed.
 */
export interface ItemCodec {
  encode(item: RlpItem): Uint8Array
  decode(bytes: Uint8Array): RlpItem
}
