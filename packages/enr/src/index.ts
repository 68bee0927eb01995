export {
  type LoadEntryConfigOptions,
  loadEntryConfig,
  mapEnvToConfig,
} from "./config/load-entry-config"
export { type EntryConfig, type EnvConfig, envPrefixes, envSchema } from "./config/schema"
export { IpAddr, type IpFamily } from "./core/addr/ip-addr"
export { formatIp, to4, to16 } from "./core/addr/raw-ip"
export { Client, type ClientSlots } from "./core/entries/client"
export { GenericEntry, type Ref, ref, withEntry } from "./core/entries/generic"
export { ID, IDv4 } from "./core/entries/id"
export { IP, IPv4, IPv6 } from "./core/entries/ip"
export { IPv4Addr, IPv6Addr } from "./core/entries/ip-addr"
export { QUIC, QUIC6, TCP, TCP6, UDP, UDP6 } from "./core/entries/port"
export { RawEntry } from "./core/entries/raw"
export { DEFAULT_MAX_SIZE, EntryMap, type EntryMapOptions } from "./core/entry-map"
export { EntryError, type EntryErrorCode } from "./core/errors/entry-error"
export { errNotFound, isNotFound, KeyError, type KeyErrorCode } from "./core/errors/key-error"
export {
  decodeEntry,
  type EntryKind,
  formatEntry,
  isWellKnownKey,
  type KnownEntry,
  type PortEntry,
  type RecordEntry,
} from "./core/known"
export { createEntryMap } from "./create-entry-map"
export type { Entry, EntryType, InPlaceEntry } from "./ports/entry"
export { type PortKey, type WellKnownKey, wellKnownKeys } from "./ports/keys"
