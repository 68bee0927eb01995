export { ethersItemCodec } from "./adapters/ethers/ethers-item-codec"
export { decode, decodeItem, encode, encodeItem } from "./core/codec"
export { RlpError, type RlpErrorCode } from "./core/rlp-error"
export { bytes, expectBytes, fixedBytes } from "./core/shapes/bytes"
export { list } from "./core/shapes/list"
export { string } from "./core/shapes/string"
export { uint, uint8, uint16, uint32 } from "./core/shapes/uint"
export type { ItemCodec } from "./ports/item-codec"
export type { RlpItem } from "./ports/rlp-item"
export type { RlpShape, ShapeValue } from "./ports/shape"
