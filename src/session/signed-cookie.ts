import bole from 'bole'
import crypto from 'node:crypto'

import type { Context } from '../data/context.js'
import { Session } from '../data/session.js'
import { _safeEqual } from '../core/utils/index.js'
import {
  SESSION_COOKIE,
  SIGNATURE_COOKIE,
  requestCookies,
  setCookie,
  stamped,
} from './storage.js'
import type { CookieOptions, SessionStorage } from './storage.js'

interface SignedCookieOptions {
  key?: string
  salt?: string
  cookieOptions?: CookieOptions
  logger?: bole.Logger
}

/**
 * Keeps the session as plain JSON in `_aino_session`, next to an HMAC-SHA256
 * signature of that JSON (plus salt) in `_aino_session_signature`. The client
 * can read the session but cannot change it.
 */
class SignedCookieStorage implements SessionStorage {
  private key: string
  private salt: string
  private cookieOptions: CookieOptions
  private logger: bole.Logger

  constructor ({
    key = process.env.SESSION_SECRET,
    salt = process.env.SESSION_SALT,
    cookieOptions = {},
    logger = bole('weft:session'),
  }: SignedCookieOptions = {}) {
    if (typeof key !== 'string') {
      throw new TypeError('`key` must be a string, got ' + typeof key)
    }
    if (key.length < 32) {
      throw new RangeError('`key` must be a string at least 32 units long')
    }
    if (typeof salt !== 'string' || salt.length === 0) {
      throw new TypeError('`salt` must be a non-empty string')
    }

    this.key = key
    this.salt = salt
    this.cookieOptions = cookieOptions
    this.logger = logger
  }

  signature (data: string) {
    return crypto.createHmac('sha256', this.key).update(data + this.salt).digest('base64')
  }

  decode (context: Context) {
    const cookies = requestCookies(context)
    const data = cookies[SESSION_COOKIE]
    if (data === undefined) {
      context.session = new Session()
      return context
    }

    const signature = cookies[SIGNATURE_COOKIE]
    if (signature === undefined || !_safeEqual(signature, this.signature(data))) {
      this.logger.warn(`discarding session with a bad signature; request_id="${context.id}"`)
      context.session = new Session()
      return context
    }

    const session = Session.parse(data)
    if (!session) {
      this.logger.warn(`discarding malformed session data; request_id="${context.id}"`)
    }
    context.session = session || new Session()
    return context
  }

  encode (context: Context) {
    const data = stamped(context)
    setCookie(context, SESSION_COOKIE, data, this.cookieOptions)
    return setCookie(context, SIGNATURE_COOKIE, this.signature(data), this.cookieOptions)
  }
}

export { SignedCookieStorage }
export type { SignedCookieOptions }
