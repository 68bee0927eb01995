import { isIPv4, isIPv6 } from "node:net"
import { EntryError } from "../errors/entry-error"
import { format4, format6, isV4InV6 } from "./raw-ip"

export type IpFamily = "v4" | "v6"

/**
 * An IP address that carries its family alongside its bytes.
 *
 * An IPv4-mapped IPv6 address (`::ffff:a.b.c.d`) is family "v6"; `unmap()`
 * turns it into the plain IPv4 address. Zones are not kept.
 */
export class IpAddr {
  private constructor(
    readonly family: IpFamily,
    private readonly octets: Uint8Array,
  ) {}

  static from4(octets: Uint8Array): IpAddr {
    if (octets.length !== 4) throw new RangeError(`IPv4 address needs 4 bytes, got ${octets.length}`)
    return new IpAddr("v4", Uint8Array.from(octets))
  }

  static from16(octets: Uint8Array): IpAddr {
    if (octets.length !== 16) {
      throw new RangeError(`IPv6 address needs 16 bytes, got ${octets.length}`)
    }
    return new IpAddr("v6", Uint8Array.from(octets))
  }

  /** Parses dotted-quad IPv4 or RFC 4291 IPv6 text. */
  static parse(text: string): IpAddr {
    if (isIPv4(text)) return new IpAddr("v4", parse4(text))
    if (isIPv6(text)) return new IpAddr("v6", parse6(text))

    throw new EntryError("invalid_ip_address", `invalid IP address: ${JSON.stringify(text)}`, {
      value: text,
    })
  }

  is4(): boolean {
    return this.family === "v4"
  }

  is6(): boolean {
    return this.family === "v6"
  }

  is4In6(): boolean {
    return this.is6() && isV4InV6(this.octets)
  }

  /** The 4 address bytes. Throws for IPv6 addresses other than IPv4-mapped ones. */
  as4(): Uint8Array {
    if (this.is4()) return Uint8Array.from(this.octets)
    if (this.is4In6()) return this.octets.slice(12)
    throw new RangeError(`${this.toString()} has no 4-byte form`)
  }

  /** The 16 address bytes; IPv4 addresses come back IPv4-mapped. */
  as16(): Uint8Array {
    if (this.is6()) return Uint8Array.from(this.octets)
    return Uint8Array.from([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0xff, 0xff, ...this.octets])
  }

  /** The address bytes in their natural width (4 or 16). */
  bytes(): Uint8Array {
    return Uint8Array.from(this.octets)
  }

  unmap(): IpAddr {
    return this.is4In6() ? IpAddr.from4(this.octets.subarray(12)) : this
  }

  equals(other: IpAddr): boolean {
    return (
      this.family === other.family &&
      this.octets.length === other.octets.length &&
      this.octets.every((b, i) => other.octets[i] === b)
    )
  }

  toString(): string {
    return this.is4() ? format4(this.octets) : format6(this.octets)
  }
}

function parse4(text: string): Uint8Array {
  return Uint8Array.from(text.split(".").map(Number))
}

function parse6(text: string): Uint8Array {
  const [address = ""] = text.split("%")
  const halves = address.split("::")
  const [head = "", tail = ""] = halves

  const left = head === "" ? [] : groupsOf(head)
  const right = tail === "" ? [] : groupsOf(tail)
  const fill = halves.length > 1 ? new Array<number>(8 - left.length - right.length).fill(0) : []
  const groups = [...left, ...fill, ...right]

  const out = new Uint8Array(16)
  groups.forEach((g, i) => {
    out[2 * i] = g >> 8
    out[2 * i + 1] = g & 0xff
  })
  return out
}

function groupsOf(part: string): number[] {
  return part.split(":").flatMap((piece) => {
    if (!piece.includes(".")) return [Number.parseInt(piece, 16)]

    const [a = 0, b = 0, c = 0, d = 0] = parse4(piece)
    return [(a << 8) | b, (c << 8) | d]
  })
}
