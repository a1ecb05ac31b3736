import type { Context, HeaderPair } from '../data/context.js'
import { ignoreHalt } from '../core/middleware.js'
import type { ConfiguredMiddleware } from '../core/middleware.js'
import { header } from '../core/response.js'

/** Append fixed headers to every response, halted or not. */
function applyHeaders (headers: Record<string, string | string[]> = {}): ConfiguredMiddleware {
  const pairs: HeaderPair[] = Object.entries(headers).flatMap(
    ([name, value]) => (typeof value === 'string' ? [value] : value).map((item): HeaderPair => [name, item])
  )

  return ignoreHalt(function applyHeadersMiddleware (context: Context) {
    for (const [name, value] of pairs) {
      header(context, name, value)
    }
    return context
  })
}

type XFOMode = 'DENY' | 'SAMEORIGIN'
function applyXFO (mode: XFOMode) {
  if (!['DENY', 'SAMEORIGIN'].includes(mode)) {
    throw new Error('applyXFO(): Allowed x-frame-options directives are DENY and SAMEORIGIN.')
  }
  return applyHeaders({ 'x-frame-options': mode })
}

export { applyHeaders, applyXFO }
export type { XFOMode }
