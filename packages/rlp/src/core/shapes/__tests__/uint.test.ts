import { decode, encode } from "../../codec"
import { uint, uint16 } from "../uint"

describe("uint", () => {
  it("encodes zero as the empty string", () => {
    expect(encode(uint16, 0)).toEqual(Uint8Array.from([0x80]))
  })

  it("encodes values below 0x80 as a single byte", () => {
    expect(encode(uint16, 0x7f)).toEqual(Uint8Array.from([0x7f]))
  })

  it("encodes big-endian without leading zeros", () => {
    expect(encode(uint16, 30303)).toEqual(Uint8Array.from([0x82, 0x76, 0x5f]))
    expect(encode(uint16, 0x100)).toEqual(Uint8Array.from([0x82, 0x01, 0x00]))
  })

  it.each([0, 1, 127, 128, 255, 256, 30303, 65535])("round-trips %i", (port) => {
    expect(decode(uint16, encode(uint16, port))).toBe(port)
  })

  it.each([-1, 65536, 1.5, Number.NaN])("rejects %d on encode", (value) => {
    expect(() => encode(uint16, value)).toThrow(`rlp: value ${value} out of range for uint16`)
  })

  it("rejects inputs wider than the type", () => {
    expect(() => decode(uint16, Uint8Array.from([0x83, 0x01, 0x00, 0x00]))).toThrow(
      "rlp: input string too long for uint16",
    )
  })

  it("rejects leading zero bytes", () => {
    expect(() => decode(uint16, Uint8Array.from([0x82, 0x00, 0x05]))).toThrow(
      "rlp: non-canonical integer (leading zero bytes) for uint16",
    )
  })

  it("rejects lists", () => {
    expect(() => decode(uint16, Uint8Array.from([0xc0]))).toThrow(
      "rlp: expected input string or byte for uint16",
    )
  })

  it("rejects unsupported widths", () => {
    expect(() => uint(12)).toThrow(RangeError)
    expect(() => uint(64)).toThrow(RangeError)
  })

  it("supports 48-bit values", () => {
    const uint48 = uint(48)

    expect(decode(uint48, encode(uint48, 2 ** 48 - 1))).toBe(2 ** 48 - 1)
  })
})
