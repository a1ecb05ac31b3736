import bole from 'bole'

import type { Middleware } from '../core/middleware.js'
import type { Context } from '../data/context.js'

type InspectableKey = Exclude<keyof Context, 'requestHeader'>

/** Debug-log one field of the context as it passes through. */
function inspect (key: InspectableKey, logger: bole.Logger = bole('weft:dev')): Middleware {
  return function inspectMiddleware (context: Context) {
    // Reading an undecoded session throws.
    const value = key === 'session' && !context.hasSession ? undefined : context[key]
    logger.debug({ id: context.id, key, value })
    return context
  }
}

export { inspect }
export type { InspectableKey }
