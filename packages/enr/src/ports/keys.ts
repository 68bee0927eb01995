/** Key names with a dedicated entry type. These are wire constants. */
export const wellKnownKeys = [
  "client",
  "id",
  "ip",
  "ip6",
  "quic",
  "quic6",
  "tcp",
  "tcp6",
  "udp",
  "udp6",
] as const

export type WellKnownKey = (typeof wellKnownKeys)[number]

export type PortKey = "tcp" | "tcp6" | "udp" | "udp6" | "quic" | "quic6"
