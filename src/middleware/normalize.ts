import bole from 'bole'
import * as cookie from 'cookie'

import type { Context, HeaderPair, JsonObject } from '../data/context.js'
import { MissingContextFieldError } from '../data/errors.js'
import type { Middleware } from '../core/middleware.js'
import { UNSAFE_KEYS, parseParams } from '../core/params.js'
import { buildBodyParser, parseContentType } from '../core/body.js'
import type { BodyParserDefinition } from '../core/body.js'
import { _isJsonObject } from '../core/utils/index.js'
import { json } from '../body/json.js'
import { urlEncoded } from '../body/urlencoded.js'

const logger = bole('weft:body')

const BODY_METHODS = new Set(['post', 'put', 'patch', 'delete'])
const OVERRIDE_METHODS = new Set(['delete', 'patch', 'put'])

function method (context: Context) {
  context.method = context.request.method.toLowerCase()
  return context
}

function path (context: Context) {
  context.path = context.request.path
    .split('/')
    .filter(Boolean)
    .map(decodeSegment)
  return context
}

function decodeSegment (segment: string) {
  try {
    return decodeURIComponent(segment)
  } catch {
    return segment
  }
}

function headers (context: Context) {
  context.headers = context.request.headers.map(([name, value]): HeaderPair => [name.toLowerCase(), value])
  return context
}

function queryParams (context: Context) {
  context.queryParams = parseParams(context.request.query)
  return context
}

/**
 * Build a body-parsing middleware from a chain of parsers. Each parser claims
 * the bodies it understands and hands the rest down the chain.
 */
function bodyParser (parsers: BodyParserDefinition[]): Middleware {
  const parse = buildBodyParser(parsers)

  return function requestBody (context: Context) {
    if (!BODY_METHODS.has(methodOf(context))) {
      return context
    }

    const [contentType] = context.requestHeader('content-type')
    const parsed = parse({
      body: String(context.request.body),
      contentType: parseContentType(contentType)
    })

    if (parsed === undefined) {
      logger.debug(`request body left unparsed; content-type="${contentType || ''}"; request_id="${context.id}"`)
      return context
    }

    context.parsedBody = parsed
    return context
  }
}

const requestBody = bodyParser([json, urlEncoded])

function cookies (context: Context) {
  const [header] = context.requestHeader('cookie')
  context.cookies = header ? cookie.parse(header) : {}
  return context
}

/**
 * Let HTML forms, which can only GET or POST, ask for another verb through a
 * `_method` field.
 */
function adjustMethod (context: Context) {
  if (methodOf(context) !== 'post' || !_isJsonObject(context.parsedBody)) {
    return context
  }

  const override = context.parsedBody._method
  if (typeof override === 'string' && OVERRIDE_METHODS.has(override.toLowerCase())) {
    context.method = override.toLowerCase()
  }
  return context
}

/**
 * Merge body, query and path parameters. Later sources win. Keys that would
 * reach the prototype (a JSON body may carry an own `__proto__`) are dropped.
 */
function params (context: Context) {
  const merged: JsonObject = {}
  for (const source of [context.parsedBody, context.queryParams, context.pathParams]) {
    if (!_isJsonObject(source)) {
      continue
    }
    for (const [key, value] of Object.entries(source)) {
      if (!UNSAFE_KEYS.has(key)) {
        merged[key] = value
      }
    }
  }
  context.params = merged
  return context
}

function methodOf (context: Context) {
  if (context.method === undefined) {
    throw new MissingContextFieldError('method', 'method')
  }
  return context.method
}

/** The usual normalizers, in the order they depend on each other. */
function common (): Middleware[] {
  return [method, path, headers, queryParams, requestBody, adjustMethod, cookies]
}

export {
  method,
  path,
  headers,
  queryParams,
  bodyParser,
  requestBody,
  cookies,
  adjustMethod,
  params,
  common,
}
