import { hexlify } from "ethers"
import { type WellKnownKey, wellKnownKeys } from "../ports/keys"
import { formatIp } from "./addr/raw-ip"
import { Client } from "./entries/client"
import { ID } from "./entries/id"
import { IP, IPv4, IPv6 } from "./entries/ip"
import { IPv4Addr, IPv6Addr } from "./entries/ip-addr"
import { QUIC, QUIC6, TCP, TCP6, UDP, UDP6 } from "./entries/port"
import { RawEntry } from "./entries/raw"
import { KeyError } from "./errors/key-error"

export type PortEntry = TCP | TCP6 | UDP | UDP6 | QUIC | QUIC6

export type KnownEntry = PortEntry | ID | IP | IPv4 | IPv6 | IPv4Addr | IPv6Addr | Client

/** Every entry a record can hold: a known type, or raw bytes under any other key. */
export type RecordEntry = KnownEntry | RawEntry

export type EntryKind = RecordEntry["kind"]

const decoders: Readonly<Record<WellKnownKey, (input: Uint8Array) => KnownEntry>> = {
  client: (input) => Client.decode(input),
  id: (input) => ID.decode(input),
  ip: (input) => IPv4Addr.decode(input),
  ip6: (input) => IPv6Addr.decode(input),
  quic: (input) => QUIC.decode(input),
  quic6: (input) => QUIC6.decode(input),
  tcp: (input) => TCP.decode(input),
  tcp6: (input) => TCP6.decode(input),
  udp: (input) => UDP.decode(input),
  udp6: (input) => UDP6.decode(input),
}

export function isWellKnownKey(key: string): key is WellKnownKey {
  return wellKnownKeys.some((k) => k === key)
}

/**
 * Decodes the value stored under `key` into its entry type. Addresses come
 * back as IPv4Addr / IPv6Addr; unrecognized keys come back as RawEntry.
 *
 * @throws KeyError when the bytes do not decode as the key's type
 */
export function decodeEntry(key: string, input: Uint8Array): RecordEntry {
  try {
    return isWellKnownKey(key) ? decoders[key](input) : new RawEntry(key, input)
  } catch (err) {
    throw new KeyError(key, err)
  }
}

/** Renders an entry as `key=value` text. */
export function formatEntry(entry: RecordEntry): string {
  switch (entry.kind) {
    case "tcp":
    case "tcp6":
    case "udp":
    case "udp6":
    case "quic":
    case "quic6":
      return `${entry.key}=${entry.value}`
    case "id":
      return `id=${entry.value}`
    case "ip":
    case "ipv4":
    case "ipv6":
      return `${entry.key}=${formatIp(entry.value)}`
    case "ipv4-addr":
    case "ipv6-addr":
      return `${entry.key}=${entry.value.toString()}`
    case "client":
      return `client=${entry.present().join("/")}`
    case "raw":
      return `${entry.key}=${hexlify(entry.raw)}`
    default: {
      const unreachable: never = entry
      return unreachable
    }
  }
}
