import bole from 'bole'
import isDev from 'are-we-dev'
import http from 'node:http'

import type { HeaderPair, InboundRequest } from '../data/context.js'
import { createHandler, internalServerError } from '../core/handler.js'
import type { HandlerOptions, RequestHandler } from '../core/handler.js'
import { _collect } from '../core/utils/index.js'

interface Lifecycle {
  isClosing: boolean
}

type Listener = (req: http.IncomingMessage, res: http.ServerResponse) => void

/**
 * Bind a pipeline to node's http server. Reading the body is the only
 * asynchronous step; everything after it is one synchronous pass.
 */
function requestListener (options: HandlerOptions, lifecycle: Lifecycle = { isClosing: false }): Listener {
  const handle = createHandler(options)
  const logger = options.logger || bole('weft:server')

  return function onrequest (req, res) {
    serve(handle, req, res, lifecycle).catch(err => {
      logger.error(err, 'could not serve request')
      if (res.headersSent) {
        res.destroy()
        return
      }
      const { status, headers, body } = internalServerError()
      res.writeHead(status, Object.fromEntries(headers))
      res.end(body)
    })
  }
}

async function serve (handle: RequestHandler, req: http.IncomingMessage, res: http.ServerResponse, lifecycle: Lifecycle) {
  const request = await inboundRequest(req)
  const { status, headers, body } = handle(request)

  for (const [name, value] of headers) {
    res.appendHeader(name, value)
  }
  if (lifecycle.isClosing) {
    res.setHeader('connection', 'close')
  }
  res.writeHead(status)
  res.end(body)
}

async function inboundRequest (req: http.IncomingMessage): Promise<InboundRequest> {
  const body = await _collect(req)
  // Prefixing rather than passing a base keeps "//foo" a path instead of a host.
  const url = new URL(`http://localhost${req.url || '/'}`)

  const headers: HeaderPair[] = []
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) {
      continue
    }
    for (const item of typeof value === 'string' ? [value] : value) {
      headers.push([name, item])
    }
  }

  const remote = req.socket.remoteAddress
  return {
    method: req.method || 'GET',
    path: url.pathname,
    query: url.search.slice(1),
    headers,
    body,
    ...(remote ? { remote: remote.replace(/^::ffff:/, '') } : {}),
    ...(req.headers.host ? { host: req.headers.host } : {})
  }
}

function runserver (options: HandlerOptions) {
  const lifecycle: Lifecycle = { isClosing: false }
  const server = http.createServer(requestListener(options, lifecycle))

  // Outside of development, let open requests finish on SIGINT but tell
  // clients not to keep the connection alive.
  if (!isDev()) {
    const onsigint = () => {
      if (lifecycle.isClosing) {
        process.exit(1)
      }
      const logger = bole('weft:server')
      logger.info('Caught SIGINT, preparing to shutdown. If running on the command line another ^C will close the app immediately.')
      lifecycle.isClosing = true
      server.close()
    }
    process.on('SIGINT', onsigint)
    server.on('close', () => process.off('SIGINT', onsigint))
  }

  return server
}

export { requestListener, runserver, inboundRequest }
export type { Listener }
