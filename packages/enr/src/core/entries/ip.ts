import { bytes, decode, encode } from "@enrkit/rlp"
import type { Entry } from "../../ports/entry"
import { IpAddr } from "../addr/ip-addr"
import { formatIp, to4, to16 } from "../addr/raw-ip"
import { EntryError } from "../errors/entry-error"

/**
 * The "ip" or "ip6" key, depending on the value.
 *
 * Use this to write an address of either family. To read an address back,
 * use IPv4 / IPv6 (or IPv4Addr / IPv6Addr), which fix the family.
 */
export class IP implements Entry {
  readonly kind = "ip"
  readonly value: Uint8Array

  constructor(value: Uint8Array) {
    this.value = Uint8Array.from(value)
  }

  static parse(text: string): IP {
    return new IP(IpAddr.parse(text).bytes())
  }

  get key(): "ip" | "ip6" {
    return to4(this.value) === undefined ? "ip6" : "ip"
  }

  encode(): Uint8Array {
    const ip4 = to4(this.value)
    if (ip4) return encode(bytes, ip4)

    const ip6 = to16(this.value)
    if (ip6) return encode(bytes, ip6)

    throw new EntryError("invalid_ip_address", `invalid IP address: ${formatIp(this.value)}`, {
      value: this.value,
    })
  }

  static decode(input: Uint8Array): IP {
    const value = decode(bytes, input)
    if (value.length !== 4 && value.length !== 16) {
      throw new EntryError(
        "invalid_ip_address",
        `invalid IP address, want 4 or 16 bytes: ${formatIp(value)}`,
        { value, size: value.length },
      )
    }
    return new IP(value)
  }
}

/** The "ip" key, the IPv4 address of the node, as raw bytes. */
export class IPv4 implements Entry {
  static readonly key = "ip"
  readonly kind = "ipv4"
  readonly key = "ip"
  readonly value: Uint8Array

  constructor(value: Uint8Array) {
    this.value = Uint8Array.from(value)
  }

  static parse(text: string): IPv4 {
    return new IPv4(IpAddr.parse(text).bytes())
  }

  encode(): Uint8Array {
    const ip4 = to4(this.value)
    if (!ip4) {
      throw new EntryError("invalid_ipv4_address", `invalid IPv4 address: ${formatIp(this.value)}`, {
        value: this.value,
      })
    }
    return encode(bytes, ip4)
  }

  static decode(input: Uint8Array): IPv4 {
    const value = decode(bytes, input)
    if (value.length !== 4) {
      throw new EntryError(
        "invalid_ipv4_address",
        `invalid IPv4 address, want 4 bytes: ${formatIp(value)}`,
        { value, size: value.length },
      )
    }
    return new IPv4(value)
  }
}

/**
 * The "ip6" key, the IPv6 address of the node, as raw bytes.
 *
 * A 4-byte value is written in its IPv4-mapped 16-byte form.
 */
export class IPv6 implements Entry {
  static readonly key = "ip6"
  readonly kind = "ipv6"
  readonly key = "ip6"
  readonly value: Uint8Array

  constructor(value: Uint8Array) {
    this.value = Uint8Array.from(value)
  }

  static parse(text: string): IPv6 {
    return new IPv6(IpAddr.parse(text).bytes())
  }

  encode(): Uint8Array {
    const ip6 = to16(this.value)
    if (!ip6) {
      throw new EntryError("invalid_ipv6_address", `invalid IPv6 address: ${formatIp(this.value)}`, {
        value: this.value,
      })
    }
    return encode(bytes, ip6)
  }

  static decode(input: Uint8Array): IPv6 {
    const value = decode(bytes, input)
    if (value.length !== 16) {
      throw new EntryError(
        "invalid_ipv6_address",
        `invalid IPv6 address, want 16 bytes: ${formatIp(value)}`,
        { value, size: value.length },
      )
    }
    return new IPv6(value)
  }
}
