import * as core from '@actions/core'
import * as http from 'node:http'
import {
  ReportValidationError,
  parseReport
} from '@ingress-observer/shared/report'
import type { ReportStore } from './report-store.js'

export const MAX_BODY_BYTES = 1_000_000

export interface ReceiverServerOptions {
  now?: () => Date
}

class PayloadTooLargeError extends Error {
  constructor() {
    super(`Request body exceeds ${MAX_BODY_BYTES} bytes`)
    this.name = 'PayloadTooLargeError'
  }
}

function sendJson(
  res: http.ServerResponse,
  statusCode: number,
  body: unknown
): void {
  const payload = JSON.stringify(body)
  res.writeHead(statusCode, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(payload)
  })
  res.end(payload)
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    let received = 0

    req.on('data', (chunk: Buffer) => {
      received += chunk.length
      if (received > MAX_BODY_BYTES) {
        req.removeAllListeners('data')
        req.resume()
        reject(new PayloadTooLargeError())
        return
      }
      chunks.push(chunk)
    })
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')))
    req.on('error', reject)
  })
}

/**
 * HTTP front of the report store:
 * POST /report, GET / and GET /reports, GET /health
 */
export function createReceiverServer(
  store: ReportStore,
  options: ReceiverServerOptions = {}
): http.Server {
  const now = options.now ?? (() => new Date())

  async function receiveReport(
    req: http.IncomingMessage,
    res: http.ServerResponse
  ): Promise<void> {
    try {
      const report = parseReport(await readBody(req))
      store.add(report, now())
      core.info(
        `Received report from ${report.cluster}: ${report.ingresses.length} ingresses`
      )
      sendJson(res, 200, { status: 'received', report_count: store.size })
    } catch (error) {
      if (error instanceof ReportValidationError) {
        core.warning(`Rejected report: ${error.message}`)
        sendJson(res, 400, { error: error.message })
        return
      }
      if (error instanceof PayloadTooLargeError) {
        sendJson(res, 413, { error: error.message })
        return
      }
      throw error
    }
  }

  async function handle(
    req: http.IncomingMessage,
    res: http.ServerResponse
  ): Promise<void> {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost')

    if (req.method === 'POST' && pathname === '/report') {
      await receiveReport(req, res)
      return
    }

    if (req.method === 'GET' && (pathname === '/' || pathname === '/reports')) {
      sendJson(res, 200, { report_count: store.size, reports: store.list() })
      return
    }

    if (req.method === 'GET' && pathname === '/health') {
      sendJson(res, 200, { status: 'healthy', report_count: store.size })
      return
    }

    sendJson(res, 404, { error: `Not found: ${req.method} ${pathname}` })
  }

  return http.createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      const errorMessage =
        error instanceof Error ? error.message : String(error)
      core.error(`Error handling ${req.method} ${req.url}: ${errorMessage}`)
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'Internal server error' })
      } else {
        res.end()
      }
    })
  })
}
