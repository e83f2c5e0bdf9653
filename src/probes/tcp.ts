import { connect, type Socket } from 'node:net'
import { parseTcpAddress } from '../core/utils/address'
import { ConnectionError } from '../core/errors'
import type { ProbeReport } from '../core/types'

export const DEFAULT_TCP_TIMEOUT_MS = 5_000

export interface TcpProbeOptions {
  timeoutMs?: number
}

function errorCode(err: Error): string | undefined {
  if ('code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

/**
 * Opens a TCP connection to `host:port` and closes it again without sending data.
 * Rejects with ConnectionError on DNS failure, refusal, unreachable hosts or timeout.
 */
export function probeTcp(address: string, options: TcpProbeOptions = {}): Promise<ProbeReport> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TCP_TIMEOUT_MS
  const parsed = parseTcpAddress(address)

  if (!parsed) {
    return Promise.reject(new ConnectionError(`Invalid address "${address}": expected host:port`))
  }

  return new Promise<ProbeReport>((resolve, reject) => {
    let settled = false
    let socket: Socket | null = null

    const settle = (error: ConnectionError | null) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      socket?.destroy()
      if (error) {
        reject(error)
      } else {
        resolve({ httpStatus: null })
      }
    }

    const timer = setTimeout(() => {
      settle(new ConnectionError(`Timeout after ${timeoutMs}ms`, { code: 'ETIMEDOUT' }))
    }, timeoutMs)

    try {
      socket = connect({ host: parsed.host, port: parsed.port })
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err))
      settle(new ConnectionError(cause.message, { code: errorCode(cause), cause }))
      return
    }

    socket.once('connect', () => {
      socket?.end()
      settle(null)
    })

    socket.on('error', (err) => {
      settle(new ConnectionError(err.message, { code: errorCode(err), cause: err }))
    })
  })
}
