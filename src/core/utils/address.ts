export interface TcpAddress {
  host: string
  port: number
}

const DIGITS = /^\d+$/

// Decimal digits only: Number() would also take "0x16", "1e3" and "+22"
function parsePort(text: string): number | null {
  if (!DIGITS.test(text)) return null
  const n = Number(text)
  return n >= 1 && n <= 65535 ? n : null
}

/**
 * Splits a `host:port` string. IPv6 hosts must be bracketed: `[::1]:22`.
 * Returns null when the string is not a usable address.
 */
export function parseTcpAddress(address: string): TcpAddress | null {
  const trimmed = address.trim()
  if (trimmed.length === 0) return null

  if (trimmed.startsWith('[')) {
    const end = trimmed.indexOf(']')
    if (end === -1) return null
    const host = trimmed.slice(1, end)
    const rest = trimmed.slice(end + 1)
    if (host.length === 0 || !rest.startsWith(':')) return null
    const port = parsePort(rest.slice(1))
    if (port === null) return null
    return { host, port }
  }

  const idx = trimmed.lastIndexOf(':')
  if (idx <= 0) return null
  const host = trimmed.slice(0, idx)
  if (host.includes(':')) return null
  const port = parsePort(trimmed.slice(idx + 1))
  if (port === null) return null
  return { host, port }
}

export function validateHttpAddress(address: string): string | null {
  let url: URL
  try {
    url = new URL(address)
  } catch {
    return 'address must be a valid URL'
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return 'address protocol must be http or https'
  }

  if (!url.hostname) return 'address must include a hostname'

  return null
}
