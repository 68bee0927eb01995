import { hexlify } from "ethers"

const v4InV6Prefix = [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0xff, 0xff] as const

export function isV4InV6(ip: Uint8Array): boolean {
  return ip.length === 16 && v4InV6Prefix.every((b, i) => ip[i] === b)
}

/**
 * The 4-byte form of `ip`, or undefined when it is not an IPv4 address.
 * Accepts 4-byte values and 16-byte IPv4-mapped values.
 */
export function to4(ip: Uint8Array): Uint8Array | undefined {
  if (ip.length === 4) return Uint8Array.from(ip)
  if (isV4InV6(ip)) return ip.slice(12)
  return undefined
}

/**
 * The 16-byte form of `ip`, or undefined for malformed lengths.
 * A 4-byte address becomes its IPv4-mapped form.
 */
export function to16(ip: Uint8Array): Uint8Array | undefined {
  if (ip.length === 16) return Uint8Array.from(ip)
  if (ip.length === 4) return Uint8Array.from([...v4InV6Prefix, ...ip])
  return undefined
}

export function format4(ip: Uint8Array): string {
  return Array.from(ip).join(".")
}

/** RFC 5952 text: lowercase, longest zero run of two or more groups compressed. */
export function format6(ip: Uint8Array): string {
  if (isV4InV6(ip)) return `::ffff:${format4(ip.subarray(12))}`

  const groups = Array.from({ length: 8 }, (_, i) => ((ip[2 * i] ?? 0) << 8) | (ip[2 * i + 1] ?? 0))

  let bestStart = -1
  let bestLen = 0
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++
      continue
    }
    let j = i
    while (j < groups.length && groups[j] === 0) j++
    if (j - i > bestLen) {
      bestStart = i
      bestLen = j - i
    }
    i = j
  }

  const hex = groups.map((g) => g.toString(16))
  if (bestLen < 2) return hex.join(":")

  return `${hex.slice(0, bestStart).join(":")}::${hex.slice(bestStart + bestLen).join(":")}`
}

/**
 * Text for a raw address as it appears in error messages: dotted quad for
 * IPv4, RFC 5952 for IPv6, "?" followed by hex for anything else.
 */
export function formatIp(ip: Uint8Array): string {
  if (ip.length === 0) return "<nil>"
  if (ip.length === 4) return format4(ip)
  if (ip.length === 16) return isV4InV6(ip) ? format4(ip.subarray(12)) : format6(ip)
  return `?${hexlify(ip).slice(2)}`
}
