import type { ItemCodec } from "../../ports/item-codec"
import { decode, decodeItem, encode, encodeItem } from "../codec"
import { uint16 } from "../shapes/uint"

describe("codec", () => {
  it("encodeItem and decodeItem use the ethers codec by default", () => {
    const item = [Uint8Array.from([1]), [Uint8Array.from([0x80])]]

    expect(decodeItem(encodeItem(item))).toEqual(item)
  })

  it("routes encode and decode through a supplied item codec", () => {
    const items: ItemCodec = {
      encode: vi.fn(() => Uint8Array.from([0xaa])),
      decode: vi.fn(() => Uint8Array.from([0x01, 0x02])),
    }

    expect(encode(uint16, 5, items)).toEqual(Uint8Array.from([0xaa]))
    expect(items.encode).toHaveBeenCalledWith(Uint8Array.from([5]))

    expect(decode(uint16, Uint8Array.from([0xaa]), items)).toBe(0x0102)
    expect(items.decode).toHaveBeenCalledWith(Uint8Array.from([0xaa]))
  })
})
