import { test } from 'tap'

import { Context } from '../../src/data/context.js'
import type { InboundRequest } from '../../src/data/context.js'
import { createHandler, respond } from '../../src/core/handler.js'
import { html, status } from '../../src/core/response.js'
import { STATUS } from '../../src/core/prelude.js'
import { IncompleteResponseError } from '../../src/data/errors.js'

function request (overrides: Partial<InboundRequest> = {}): InboundRequest {
  return { method: 'GET', path: '/', query: '', headers: [], body: '', ...overrides }
}

function recorder () {
  const logged: unknown[][] = []
  const record = (...args: unknown[]) => {
    logged.push(args)
  }
  return { logged, logger: { debug: record, info: record, warn: record, error: record } }
}

test('respond reads the response triple', async (t) => {
  const ctx = html(status(new Context(request()), 200), 'ok')
  t.same(respond(ctx), { status: 200, headers: [['Content-Type', 'text/html']], body: 'ok' })
})

test('respond names every missing field', async (t) => {
  const ctx = status(new Context(request()), 200)
  t.throws(() => respond(ctx), {
    name: 'IncompleteResponseError',
    missing: ['responseHeaders', 'responseBody'],
  })
})

test('incomplete responses carry a 500 status', async (t) => {
  t.equal(new IncompleteResponseError(['responseBody'])[STATUS], 500)
})

test('createHandler folds the request through the middleware', async (t) => {
  const handle = createHandler({
    middleware: [
      (ctx: Context) => status(ctx, 200),
      (ctx: Context) => html(ctx, `hello ${ctx.request.path}`),
    ],
  })
  t.same(handle(request({ path: '/there' })), {
    status: 200,
    headers: [['Content-Type', 'text/html']],
    body: 'hello /there',
  })
})

test('createHandler turns a thrown error into a logged 500', async (t) => {
  const { logged, logger } = recorder()
  const failure = new Error('boom')
  const handle = createHandler({
    middleware: [
      () => {
        throw failure
      },
    ],
    logger,
  })

  const response = handle(request({ headers: [['x-request-id', 'req-1']] }))
  t.same(response, { status: 500, headers: [['Content-Type', 'text/html']], body: 'Internal Server Error' })
  t.equal(logged.length, 1)
  t.equal(logged[0][0], failure)
  t.equal(logged[0][1], 'request failed; request_id="req-1"')
})

test('createHandler answers 500 for an incomplete response', async (t) => {
  const { logged, logger } = recorder()
  const handle = createHandler({ middleware: [(ctx: Context) => status(ctx, 200)], logger })
  t.equal(handle(request()).status, 500)
  t.match(logged[0][0], { name: 'IncompleteResponseError' })
})

test('createHandler passes config through to the context', async (t) => {
  const handle = createHandler({
    middleware: [(ctx: Context) => html(status(ctx, 200), `${ctx.config.scheme}://${ctx.config.host}`)],
    config: { scheme: 'https', host: 'shop.test' },
  })
  t.equal(handle(request()).body, 'https://shop.test')
})
