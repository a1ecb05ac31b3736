import { test } from 'tap'

import { Context } from '../../src/data/context.js'
import type { InboundRequest } from '../../src/data/context.js'
import { Session } from '../../src/data/session.js'

function request (overrides: Partial<InboundRequest> = {}): InboundRequest {
  return { method: 'GET', path: '/', query: '', headers: [], body: '', ...overrides }
}

test('context takes its id from x-request-id', async (t) => {
  const ctx = new Context(request({ headers: [['X-Request-Id', 'abc-123']] }))
  t.equal(ctx.id, 'abc-123')
})

test('context generates a uuid when no request id is sent', async (t) => {
  const ctx = new Context(request())
  t.match(ctx.id, /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
})

test('reading the session before decoding throws', async (t) => {
  const ctx = new Context(request())
  t.equal(ctx.hasSession, false)
  t.equal(ctx.sessionUpdated, false)
  t.throws(() => ctx.session, { name: 'SessionNotLoadedError' })
})

test('sessionUpdated follows the session dirty flag', async (t) => {
  const ctx = new Context(request())
  ctx.session = new Session([['user', 'ada']])
  t.equal(ctx.sessionUpdated, false)
  ctx.session.set('user', 'grace')
  t.equal(ctx.sessionUpdated, true)
})

test('requestHeader returns every value, case-insensitively', async (t) => {
  const ctx = new Context(request({ headers: [['Accept', 'text/html'], ['accept', 'application/json']] }))
  t.same(ctx.requestHeader('ACCEPT'), ['text/html', 'application/json'])
  t.same(ctx.requestHeader('missing'), [])
})

test('config overrides are merged over defaults', async (t) => {
  const ctx = new Context(request(), { scheme: 'https', host: 'shop.test' })
  t.equal(ctx.config.scheme, 'https')
  t.equal(ctx.config.host, 'shop.test')
  t.type(ctx.config.environment, 'string')
})
