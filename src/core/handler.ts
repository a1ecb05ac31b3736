import bole from 'bole'

import { Context } from '../data/context.js'
import type { ContextConfig, HeaderPair, InboundRequest, ResponseBody } from '../data/context.js'
import { IncompleteResponseError } from '../data/errors.js'
import { reduce } from './middleware.js'
import type { MiddlewareConfig } from './middleware.js'

interface ResponseTriple {
  status: number
  headers: HeaderPair[]
  body: ResponseBody
}

interface HandlerOptions {
  middleware: MiddlewareConfig
  config?: Partial<ContextConfig>
  logger?: bole.Logger
}

interface RequestHandler {
  (request: InboundRequest): ResponseTriple
}

/** Read the response off a finished context. */
function respond (context: Context): ResponseTriple {
  const { responseStatus: status, responseHeaders: headers, responseBody: body } = context
  if (status === undefined || headers === undefined || body === undefined) {
    const missing = [
      ...(status === undefined ? ['responseStatus'] : []),
      ...(headers === undefined ? ['responseHeaders'] : []),
      ...(body === undefined ? ['responseBody'] : []),
    ]
    throw new IncompleteResponseError(missing)
  }
  return { status, headers, body }
}

/**
 * The outermost request boundary: everything that escapes the pipeline is
 * logged and answered with a bare 500.
 */
function createHandler ({
  middleware,
  config = {},
  logger = bole('weft:server'),
}: HandlerOptions): RequestHandler {
  return function handle (request: InboundRequest) {
    let context: Context | undefined
    try {
      context = new Context(request, config)
      return respond(reduce(context, middleware))
    } catch (err) {
      logger.error(err, `request failed; request_id="${context ? context.id : 'unknown'}"`)
      return internalServerError()
    }
  }
}

function internalServerError (): ResponseTriple {
  return {
    status: 500,
    headers: [['Content-Type', 'text/html']],
    body: 'Internal Server Error'
  }
}

export { respond, createHandler, internalServerError }
export type { ResponseTriple, HandlerOptions, RequestHandler }
