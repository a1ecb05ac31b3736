import { Context } from '../data/context.js'
import { MiddlewareContractError } from '../data/errors.js'

interface Middleware {
  (context: Context): Context
}

interface MiddlewareOptions {
  /** Run even after an earlier middleware has set `context.halt`. */
  ignoreHalt?: boolean
}

type ConfiguredMiddleware = readonly [Middleware, MiddlewareOptions]

/**
 * A single middleware, a middleware paired with its options, or a (possibly
 * nested) list of either. Lists are flattened depth-first in declared order.
 */
type MiddlewareConfig = Middleware | ConfiguredMiddleware | readonly MiddlewareConfig[]

function ignoreHalt (middleware: Middleware): ConfiguredMiddleware {
  return [middleware, { ignoreHalt: true }]
}

function reduce (context: Context, middleware: MiddlewareConfig): Context {
  for (const [mw, { ignoreHalt = false }] of flatten(middleware)) {
    if (context.halt && !ignoreHalt) {
      continue
    }

    const next: unknown = mw(context)
    if (!(next instanceof Context)) {
      throw new MiddlewareContractError(mw.name)
    }
    context = next
  }

  return context
}

function * flatten (middleware: MiddlewareConfig): Generator<ConfiguredMiddleware> {
  if (typeof middleware === 'function') {
    yield [middleware, {}]
    return
  }

  if (isConfigured(middleware)) {
    yield middleware
    return
  }

  for (const entry of middleware) {
    yield * flatten(entry)
  }
}

// A two-element list is ambiguous: [mw, mw] is a nested list, [mw, {...}] is
// a middleware with options.
function isConfigured (entry: MiddlewareConfig): entry is ConfiguredMiddleware {
  return (
    typeof entry !== 'function' &&
    entry.length === 2 &&
    typeof entry[0] === 'function' &&
    isOptions(entry[1])
  )
}

function isOptions (value: unknown): value is MiddlewareOptions {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export { reduce, flatten, ignoreHalt }
export type { Middleware, MiddlewareOptions, ConfiguredMiddleware, MiddlewareConfig }
