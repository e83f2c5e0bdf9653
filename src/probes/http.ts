import { StatusMismatchError, TransportError } from '../core/errors'
import type { HttpBody, HttpTarget, ProbeReport } from '../core/types'

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000
export const USER_AGENT = 'netcheck/0.1'
const MAX_DETAIL_BYTES = 64 * 1024 // 64 KiB

export interface HttpProbeOptions {
  timeoutMs?: number
}

export interface HttpRequestPlan {
  method: 'GET' | 'POST'
  headers: Record<string, string>
  body: string | null
  expectedStatus: number
}

function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

function isAbortError(err: unknown): boolean {
  if (err && typeof err === 'object' && 'name' in err) {
    return err.name === 'AbortError' || err.name === 'TimeoutError'
  }
  return false
}

// undici wraps the socket error in `cause`: "fetch failed" alone says nothing
function describeTransportError(err: unknown): string {
  const message = toErrorMessage(err)
  if (err instanceof Error && err.cause !== undefined) {
    const cause = toErrorMessage(err.cause)
    if (cause && cause !== message) {
      return `${message}: ${cause}`
    }
  }
  return message
}

function encodeBody(body: HttpBody): { contentType: string; payload: string } {
  switch (body.type) {
    case 'form':
      return {
        contentType: 'application/x-www-form-urlencoded',
        payload: new URLSearchParams(body.params).toString(),
      }
    case 'json':
      return { contentType: 'application/json', payload: JSON.stringify(body.json) }
  }
}

/**
 * Basic targets are a GET expecting 200; custom targets POST their form or JSON
 * body and expect the configured status.
 */
export function planHttpRequest(target: HttpTarget): HttpRequestPlan {
  const headers: Record<string, string> = { 'User-Agent': USER_AGENT }

  if (!target.custom) {
    return { method: 'GET', headers, body: null, expectedStatus: 200 }
  }

  const { contentType, payload } = encodeBody(target.custom.body)
  headers['Content-Type'] = contentType

  return { method: 'POST', headers, body: payload, expectedStatus: target.custom.expectedStatus }
}

// Drops an incomplete trailing UTF-8 sequence instead of flushing it as U+FFFD
async function readTextUpTo(res: Response, maxBytes: number, signal: AbortSignal): Promise<string> {
  if (!res.body) return ''

  const reader = res.body.getReader()
  const decoder = new TextDecoder()
  let bytes = 0
  let text = ''
  let truncated = false

  // deadline hit mid-body: stop waiting and keep what arrived
  const deadline = new Promise<null>((resolve) => {
    if (signal.aborted) resolve(null)
    else signal.addEventListener('abort', () => resolve(null), { once: true })
  })

  try {
    while (true) {
      const r = await Promise.race([
        reader.read().catch((err: unknown) => {
          if (signal.aborted) return null
          throw err
        }),
        deadline,
      ])
      if (r === null) {
        truncated = true
        break
      }
      if (r.done) break

      const chunk: Uint8Array = r.value
      const remaining = maxBytes - bytes
      if (chunk.length <= remaining) {
        bytes += chunk.length
        text += decoder.decode(chunk, { stream: true })
      } else {
        text += decoder.decode(chunk.slice(0, remaining), { stream: true })
        truncated = true
        break
      }
    }
  } finally {
    if (truncated) {
      await reader.cancel().catch(() => undefined)
    }
    reader.releaseLock()
  }

  return truncated ? text : text + decoder.decode()
}

/**
 * Issues the planned request once. Resolves with the observed status when it matches;
 * rejects with StatusMismatchError (status plus response body) or TransportError
 * (no status) otherwise.
 */
export async function probeHttp(target: HttpTarget, options: HttpProbeOptions = {}): Promise<ProbeReport> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS
  const plan = planHttpRequest(target)

  const init: RequestInit = {
    method: plan.method,
    headers: plan.headers,
    redirect: 'follow',
  }
  if (plan.body !== null) {
    init.body = plan.body
  }

  // One deadline covers the request, the response headers and any body read
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  try {
    let res: Response
    try {
      res = await fetch(target.address, { ...init, signal: controller.signal })
    } catch (err) {
      if (isAbortError(err)) {
        throw new TransportError(`Timeout after ${timeoutMs}ms`, { cause: err })
      }
      throw new TransportError(describeTransportError(err), { cause: err })
    }

    if (res.status !== plan.expectedStatus) {
      let details: string
      try {
        details = (await readTextUpTo(res, MAX_DETAIL_BYTES, controller.signal)).trim()
      } catch (err) {
        details = `<response body unreadable: ${toErrorMessage(err)}>`
      }
      throw new StatusMismatchError(res.status, plan.expectedStatus, details.length > 0 ? details : null)
    }

    await res.body?.cancel().catch(() => undefined)
    return { httpStatus: res.status }
  } finally {
    clearTimeout(timer)
  }
}
