import { createServer as createHttpServer, type IncomingHttpHeaders } from 'node:http'
import { createServer as createTcpServer, type AddressInfo, type Server } from 'node:net'

export interface RecordedRequest {
  method: string
  url: string
  headers: IncomingHttpHeaders
  body: string
}

export interface LocalHttpServer {
  origin: string
  requests: RecordedRequest[]
  close(): Promise<void>
}

export interface LocalTcpServer {
  address: string
  connections(): number
  close(): Promise<void>
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(0, '127.0.0.1', () => {
      const info: AddressInfo | string | null = server.address()
      if (info !== null && typeof info === 'object') {
        resolve(info.port)
      } else {
        reject(new Error('Server is not listening on a TCP port'))
      }
    })
  })
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()))
  })
}

/**
 * Loopback HTTP server with a few fixed routes:
 *   /status/<code>  responds <code> with body "status <code>"
 *   /slow/<ms>      waits <ms> then responds 200
 *   /redirect       302 to /status/200
 *   /hang           500, writes "partial" and never ends the body
 *   /utf8           500 with "a" followed by 40000 two-byte characters
 *   anything else   200 "ok"
 */
export async function startHttpServer(): Promise<LocalHttpServer> {
  const requests: RecordedRequest[] = []

  const server = createHttpServer((req, res) => {
    const chunks: Buffer[] = []
    req.on('data', (chunk: Buffer) => chunks.push(chunk))
    req.on('end', () => {
      const url = req.url ?? '/'
      requests.push({ method: req.method ?? 'GET', url, headers: req.headers, body: Buffer.concat(chunks).toString('utf-8') })

      const status = /^\/status\/(\d{3})$/.exec(url)
      if (status?.[1]) {
        const code = Number(status[1])
        res.writeHead(code, { 'Content-Type': 'text/plain' })
        res.end(`status ${code}`)
        return
      }

      const slow = /^\/slow\/(\d+)$/.exec(url)
      if (slow?.[1]) {
        setTimeout(() => {
          res.writeHead(200, { 'Content-Type': 'text/plain' })
          res.end('ok')
        }, Number(slow[1]))
        return
      }

      if (url === '/hang') {
        res.writeHead(500, { 'Content-Type': 'text/plain' })
        res.write('partial')
        return
      }

      if (url === '/utf8') {
        res.writeHead(500, { 'Content-Type': 'text/plain; charset=utf-8' })
        res.end(`a${'é'.repeat(40_000)}`)
        return
      }

      if (url === '/redirect') {
        res.writeHead(302, { Location: '/status/200' })
        res.end()
        return
      }

      res.writeHead(200, { 'Content-Type': 'text/plain' })
      res.end('ok')
    })
  })

  const port = await listen(server)

  return {
    origin: `http://127.0.0.1:${port}`,
    requests,
    close: async () => {
      server.closeAllConnections()
      await closeServer(server)
    },
  }
}

/**
 * Loopback TCP server that accepts and immediately drops connections
 */
export async function startTcpServer(): Promise<LocalTcpServer> {
  let connections = 0
  const server = createTcpServer((socket) => {
    connections++
    socket.destroy()
  })

  const port = await listen(server)

  return {
    address: `127.0.0.1:${port}`,
    connections: () => connections,
    close: () => closeServer(server),
  }
}

/**
 * A loopback port with nothing listening on it
 */
export async function findClosedPort(): Promise<number> {
  const server = createTcpServer()
  const port = await listen(server)
  await closeServer(server)
  return port
}
