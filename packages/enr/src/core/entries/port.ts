import { decode, encode, uint16 } from "@enrkit/rlp"
import type { Entry } from "../../ports/entry"
import type { PortKey } from "../../ports/keys"

/**
 * A 16-bit port number. Range is enforced by the codec: encoding a value
 * outside 0..65535 throws `rlp_uint_out_of_range`.
 */
abstract class PortEntry<K extends PortKey> implements Entry {
  abstract readonly kind: K

  constructor(readonly value: number) {}

  get key(): K {
    return this.kind
  }

  encode(): Uint8Array {
    return encode(uint16, this.value)
  }
}

/** The "tcp" key, the TCP port of the node. */
export class TCP extends PortEntry<"tcp"> {
  static readonly key = "tcp"
  readonly kind = "tcp"

  static decode(input: Uint8Array): TCP {
    return new TCP(decode(uint16, input))
  }
}

/** The "tcp6" key, the IPv6-specific TCP port of the node. */
export class TCP6 extends PortEntry<"tcp6"> {
  static readonly key = "tcp6"
  readonly kind = "tcp6"

  static decode(input: Uint8Array): TCP6 {
    return new TCP6(decode(uint16, input))
  }
}

/** The "udp" key, the UDP port of the node. */
export class UDP extends PortEntry<"udp"> {
  static readonly key = "udp"
  readonly kind = "udp"

  static decode(input: Uint8Array): UDP {
    return new UDP(decode(uint16, input))
  }
}

/** The "udp6" key, the IPv6-specific UDP port of the node. */
export class UDP6 extends PortEntry<"udp6"> {
  static readonly key = "udp6"
  readonly kind = "udp6"

  static decode(input: Uint8Array): UDP6 {
    return new UDP6(decode(uint16, input))
  }
}

/** The "quic" key, the QUIC port of the node. */
export class QUIC extends PortEntry<"quic"> {
  static readonly key = "quic"
  readonly kind = "quic"

  static decode(input: Uint8Array): QUIC {
    return new QUIC(decode(uint16, input))
  }
}

/** The "quic6" key, the IPv6-specific QUIC port of the node. */
export class QUIC6 extends PortEntry<"quic6"> {
  static readonly key = "quic6"
  readonly kind = "quic6"

  static decode(input: Uint8Array): QUIC6 {
    return new QUIC6(decode(uint16, input))
  }
}
