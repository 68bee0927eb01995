import { decode, encode, fixedBytes } from "@enrkit/rlp"
import type { Entry } from "../../ports/entry"
import { IpAddr } from "../addr/ip-addr"
import { EntryError } from "../errors/entry-error"

const bytes4 = fixedBytes(4)
const bytes16 = fixedBytes(16)

/** The "ip" key, backed by a structured address that must be IPv4. */
export class IPv4Addr implements Entry {
  static readonly key = "ip"
  readonly kind = "ipv4-addr"
  readonly key = "ip"

  constructor(readonly value: IpAddr) {}

  static parse(text: string): IPv4Addr {
    return new IPv4Addr(IpAddr.parse(text))
  }

  encode(): Uint8Array {
    if (!this.value.is4()) {
      throw new EntryError("address_not_ipv4", "address is not IPv4", {
        value: this.value.toString(),
      })
    }
    return encode(bytes4, this.value.as4())
  }

  static decode(input: Uint8Array): IPv4Addr {
    return new IPv4Addr(IpAddr.from4(decode(bytes4, input)))
  }
}

/** The "ip6" key, backed by a structured address that must be IPv6. */
export class IPv6Addr implements Entry {
  static readonly key = "ip6"
  readonly kind = "ipv6-addr"
  readonly key = "ip6"

  constructor(readonly value: IpAddr) {}

  static parse(text: string): IPv6Addr {
    return new IPv6Addr(IpAddr.parse(text))
  }

  encode(): Uint8Array {
    if (!this.value.is6()) {
      throw new EntryError("address_not_ipv6", "address is not IPv6", {
        value: this.value.toString(),
      })
    }
    return encode(bytes16, this.value.as16())
  }

  static decode(input: Uint8Array): IPv6Addr {
    return new IPv6Addr(IpAddr.from16(decode(bytes16, input)))
  }
}
