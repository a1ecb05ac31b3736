import { test } from 'tap'

import { Context } from '../../src/data/context.js'
import type { InboundRequest } from '../../src/data/context.js'
import { reduce } from '../../src/core/middleware.js'
import {
  adjustMethod,
  bodyParser,
  common,
  cookies,
  headers,
  method,
  params,
  path,
  queryParams,
  requestBody,
} from '../../src/middleware/normalize.js'
import { json } from '../../src/body/json.js'

function context (overrides: Partial<InboundRequest> = {}) {
  return new Context({ method: 'GET', path: '/', query: '', headers: [], body: '', ...overrides })
}

function form (body: string, verb = 'POST') {
  return reduce(context({
    method: verb,
    headers: [['Content-Type', 'application/x-www-form-urlencoded']],
    body,
  }), common())
}

test('method lower-cases the verb', async (t) => {
  t.equal(method(context({ method: 'PATCH' })).method, 'patch')
})

test('path splits, drops empties and decodes segments', async (t) => {
  t.same(path(context({ path: '/orders//42/' })).path, ['orders', '42'])
  t.same(path(context({ path: '/files/a%20b' })).path, ['files', 'a b'])
  t.same(path(context({ path: '/' })).path, [])
})

test('path keeps malformed escapes verbatim', async (t) => {
  t.same(path(context({ path: '/bad/%E0%A4%A' })).path, ['bad', '%E0%A4%A'])
})

test('headers lower-cases names and keeps order and duplicates', async (t) => {
  const ctx = headers(context({ headers: [['X-A', '1'], ['Accept', 'text/html'], ['x-a', '2']] }))
  t.same(ctx.headers, [['x-a', '1'], ['accept', 'text/html'], ['x-a', '2']])
})

test('queryParams parses nested keys', async (t) => {
  t.same(queryParams(context({ query: 'a[]=1&a[]=2&b[x]=3' })).queryParams, { a: ['1', '2'], b: { x: '3' } })
})

test('requestBody parses form bodies', async (t) => {
  t.same(form('item=tea&lines[][qty]=2').parsedBody, { item: 'tea', lines: [{ qty: '2' }] })
})

test('requestBody parses JSON bodies, ignoring the charset parameter', async (t) => {
  for (const charset of ['UTF-8', 'utf8', 'ISO-8859-1']) {
    const ctx = reduce(context({
      method: 'PUT',
      headers: [['content-type', `Application/JSON; charset=${charset}`]],
      body: Buffer.from('{"item":"tea"}'),
    }), common())
    t.same(ctx.parsedBody, { item: 'tea' }, charset)
  }
})

test('requestBody parses form bodies whatever their charset', async (t) => {
  const ctx = reduce(context({
    method: 'POST',
    headers: [['content-type', 'application/x-www-form-urlencoded; charset=ISO-8859-1']],
    body: 'name=value&_method=delete',
  }), common())
  t.same(ctx.parsedBody, { name: 'value', _method: 'delete' })
  t.equal(ctx.method, 'delete')
})

test('requestBody accepts vendor JSON types', async (t) => {
  const ctx = reduce(context({
    method: 'POST',
    headers: [['content-type', 'application/vnd.orders.v1+json']],
    body: '[1,2]',
  }), common())
  t.same(ctx.parsedBody, [1, 2])
})

test('requestBody leaves invalid JSON unparsed', async (t) => {
  const ctx = reduce(context({
    method: 'POST',
    headers: [['content-type', 'application/json']],
    body: '{nope',
  }), common())
  t.equal(ctx.parsedBody, undefined)
})

test('requestBody leaves unknown or missing content types unparsed', async (t) => {
  t.equal(reduce(context({ method: 'POST', headers: [['content-type', 'text/plain']], body: 'a=1' }), common()).parsedBody, undefined)
  t.equal(reduce(context({ method: 'POST', body: 'a=1' }), common()).parsedBody, undefined)
})

test('requestBody ignores bodies on get', async (t) => {
  t.equal(form('item=tea', 'GET').parsedBody, undefined)
})

test('requestBody needs the method normalizer first', async (t) => {
  t.throws(() => requestBody(context({ method: 'POST' })), {
    name: 'MissingContextFieldError',
    field: 'method',
  })
})

test('bodyParser builds a middleware from a custom parser chain', async (t) => {
  const jsonOnly = bodyParser([json])
  const ctx = jsonOnly(method(headers(context({
    method: 'POST',
    headers: [['content-type', 'application/x-www-form-urlencoded']],
    body: 'a=1',
  }))))
  t.equal(ctx.parsedBody, undefined)
})

test('cookies parses the cookie header', async (t) => {
  const ctx = cookies(headers(context({ headers: [['Cookie', 'a=1; b=hello%20world']] })))
  t.same(ctx.cookies, { a: '1', b: 'hello world' })
})

test('cookies defaults to an empty object', async (t) => {
  t.same(cookies(context()).cookies, {})
})

test('adjustMethod honours _method on post', async (t) => {
  t.equal(form('_method=delete').method, 'delete')
  t.equal(form('_method=PATCH').method, 'patch')
  t.equal(form('_method=put').method, 'put')
})

test('adjustMethod ignores other verbs and other methods', async (t) => {
  t.equal(form('_method=get').method, 'post')
  t.equal(form('_method=delete', 'PUT').method, 'put')
  t.equal(adjustMethod(method(context({ method: 'POST' }))).method, 'post')
})

test('params merges body, query and path with path winning', async (t) => {
  const ctx = reduce(context({
    method: 'POST',
    query: 'id=from-query&page=2',
    headers: [['content-type', 'application/x-www-form-urlencoded']],
    body: 'id=from-body&page=1&item=tea',
  }), common())
  ctx.pathParams = { id: 'from-path' }
  t.same(params(ctx).params, { id: 'from-path', page: '2', item: 'tea' })
})

test('params skips a body that is not an object', async (t) => {
  const ctx = reduce(context({
    method: 'POST',
    query: 'page=2',
    headers: [['content-type', 'application/json']],
    body: '[1,2]',
  }), common())
  t.same(params(ctx).params, { page: '2' })
})

test('params drops keys that would replace its prototype', async (t) => {
  const ctx = reduce(context({
    method: 'POST',
    headers: [['content-type', 'application/json']],
    body: '{"__proto__":{"csrf_token":"forged","admin":"yes"},"constructor":"x","item":"tea"}',
  }), common())
  const merged = params(ctx).params

  t.same(merged, { item: 'tea' })
  t.equal(Object.getPrototypeOf(merged), Object.prototype)
  t.equal(merged?.admin, undefined)
  t.equal(merged?.csrf_token, undefined)
})
