import bole from 'bole'
import bistre from 'bistre'
import isDev from 'are-we-dev'

import { serviceName } from '../core/prelude.js'
import { ignoreHalt } from '../core/middleware.js'
import type { ConfiguredMiddleware } from '../core/middleware.js'
import type { Context } from '../data/context.js'

interface LogOptions {
  logger?: bole.Logger
  level?: bole.Level
  stream?: NodeJS.WritableStream
}

const LEVELS = new Set<string>(['debug', 'info', 'warn', 'error'])

function levelFromEnv (): bole.Level {
  const level = process.env.LOG_LEVEL
  switch (level) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return level
    default:
      return 'debug'
  }
}

/**
 * Configure log output and return a middleware that writes one line per
 * request. It runs on halted requests too, so mount it last. In development
 * the output is pretty-printed with bistre.
 */
function log ({
  logger = bole(serviceName),
  level = levelFromEnv(),
  stream = process.stdout,
}: LogOptions = {}): ConfiguredMiddleware {
  if (!LEVELS.has(level)) {
    throw new RangeError(`log(): level must be one of ${[...LEVELS].join(', ')}, got "${level}"`)
  }
  if (isDev()) {
    const pretty = bistre({ time: true })
    pretty.pipe(stream)
    stream = pretty
  }
  bole.output({ level, stream })

  return ignoreHalt(function logMiddleware (context: Context) {
    const [userAgent] = context.requestHeader('user-agent')
    const [referer] = context.requestHeader('referer')
    const method = (context.method || context.request.method).toUpperCase()

    logger.info({
      message: `${context.responseStatus} ${method} ${context.request.path}`,
      id: context.id,
      ip: context.request.remote,
      host: context.request.host,
      method,
      url: context.request.path,
      elapsed: Date.now() - context.start,
      status: context.responseStatus,
      userAgent,
      referer
    })

    return context
  })
}

export { log }
export type { LogOptions }
