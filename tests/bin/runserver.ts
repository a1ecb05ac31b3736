import { test } from 'tap'
import { inject } from '@hapi/shot'

import type { Context } from '../../src/data/context.js'
import { body, header, html, status } from '../../src/core/response.js'
import { requestListener, runserver } from '../../src/bin/runserver.js'

function recorder () {
  const logged: unknown[][] = []
  const record = (...args: unknown[]) => {
    logged.push(args)
  }
  return { logged, logger: { debug: record, info: record, warn: record, error: record } }
}

function echo (context: Context) {
  status(context, 200)
  header(context, 'Content-Type', 'application/json')
  return body(context, JSON.stringify({
    method: context.request.method,
    path: context.request.path,
    query: context.request.query,
    body: String(context.request.body),
    remote: context.request.remote,
    host: context.request.host,
    custom: context.request.headers.filter(([name]) => name === 'x-custom').map(([, value]) => value),
  }))
}

test('the listener hands the request over as an inbound request', async (t) => {
  const onrequest = requestListener({ middleware: [echo] })
  const response = await inject(onrequest, {
    method: 'POST',
    url: '/orders/42?expand=lines',
    headers: { host: 'shop.test', 'x-custom': 'yes' },
    payload: 'item=tea',
    remoteAddress: '::ffff:10.0.0.2',
  })

  t.equal(response.statusCode, 200)
  t.same(JSON.parse(response.payload), {
    method: 'POST',
    path: '/orders/42',
    query: 'expand=lines',
    body: 'item=tea',
    remote: '10.0.0.2',
    host: 'shop.test',
    custom: ['yes'],
  })
})

test('duplicate response headers are all written', async (t) => {
  const onrequest = requestListener({
    middleware: [
      (context: Context) => header(header(html(status(context, 201), 'made'), 'Set-Cookie', 'a=1'), 'Set-Cookie', 'b=2'),
    ],
  })
  const response = await inject(onrequest, { method: 'GET', url: '/' })

  t.equal(response.statusCode, 201)
  t.equal(response.headers['content-type'], 'text/html')
  t.same(response.headers['set-cookie'], ['a=1', 'b=2'])
  t.equal(response.payload, 'made')
})

test('a throwing pipeline answers 500 and logs the error', async (t) => {
  const { logged, logger } = recorder()
  const onrequest = requestListener({
    middleware: [
      () => {
        throw new Error('boom')
      },
    ],
    logger,
  })
  const response = await inject(onrequest, { method: 'GET', url: '/' })

  t.equal(response.statusCode, 500)
  t.equal(response.headers['content-type'], 'text/html')
  t.equal(response.payload, 'Internal Server Error')
  t.equal(logged.length, 1)
  t.match(logged[0][0], { message: 'boom' })
})

test('runserver returns an unstarted http server', async (t) => {
  const server = runserver({ middleware: [echo] })
  t.equal(server.listening, false)
  t.equal(server.listeners('request').length, 1)
  server.close()
})
