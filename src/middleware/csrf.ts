import crypto from 'node:crypto'

import type { Context } from '../data/context.js'
import { MissingCsrfTokenError } from '../data/errors.js'
import { _isJsonObject, _safeEqual } from '../core/utils/index.js'
import { body, halt, header, status } from '../core/response.js'

const TOKEN_KEY = 'csrf_token'
const READ_METHODS = new Set(['get', 'head', 'options'])

/** Give the session a token if it does not have one yet. */
function set (context: Context) {
  if (typeof context.session.get(TOKEN_KEY) !== 'string') {
    context.session.set(TOKEN_KEY, crypto.randomBytes(32).toString('base64url'))
  }
  return context
}

/**
 * Reject state-changing requests whose submitted `csrf_token` does not match
 * the session's. Runs after body parsing and session decoding.
 */
function check (context: Context) {
  if (READ_METHODS.has(String(context.method))) {
    return context
  }

  if (isValid(context)) {
    return context
  }

  halt(context)
  status(context, 403)
  header(context, 'Content-Type', 'text/plain')
  return body(context, "CSRF token doesn't match")
}

function isValid (context: Context) {
  if (!context.hasSession || !_isJsonObject(context.parsedBody)) {
    return false
  }

  const expected = context.session.get(TOKEN_KEY)
  const supplied = context.parsedBody[TOKEN_KEY] ?? context.params?.[TOKEN_KEY]
  return (
    typeof expected === 'string' &&
    typeof supplied === 'string' &&
    expected.length > 0 &&
    supplied.length > 0 &&
    _safeEqual(expected, supplied)
  )
}

/** The token to embed in a rendered form. */
function getToken (context: Context): string {
  const token = context.session.get(TOKEN_KEY)
  if (typeof token !== 'string' || token.length === 0) {
    throw new MissingCsrfTokenError()
  }
  return token
}

export { set, check, getToken, TOKEN_KEY }
