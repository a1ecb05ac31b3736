import * as cookie from 'cookie'

import type { Context } from '../data/context.js'
import { MissingContextFieldError } from '../data/errors.js'
import { header } from '../core/response.js'

const SESSION_COOKIE = '_aino_session'
const SIGNATURE_COOKIE = '_aino_session_signature'

type CookieOptions = Omit<cookie.CookieSerializeOptions, 'encode'>

/**
 * Persists the session between requests. `decode` must leave a session on the
 * context, even when the request carries nothing usable; `encode` appends
 * whatever `Set-Cookie` headers it needs.
 */
interface SessionStorage {
  decode (context: Context): Context
  encode (context: Context): Context
}

function requestCookies (context: Context) {
  if (!context.cookies) {
    throw new MissingContextFieldError('cookies', 'cookies')
  }
  return context.cookies
}

function setCookie (context: Context, name: string, value: string, options: CookieOptions = {}) {
  return header(context, 'Set-Cookie', cookie.serialize(name, value, {
    path: '/',
    httpOnly: true,
    ...options
  }))
}

// The timestamp only goes on the wire; the session on the context is left as
// the application wrote it.
function stamped (context: Context) {
  return JSON.stringify({ ...context.session.toJSON(), t: new Date().toISOString() })
}

export { SESSION_COOKIE, SIGNATURE_COOKIE, requestCookies, setCookie, stamped }
export type { SessionStorage, CookieOptions }
