import bole from 'bole'
import crypto from 'node:crypto'

import type { Context } from '../data/context.js'
import { Session } from '../data/session.js'
import { SESSION_COOKIE, requestCookies, setCookie, stamped } from './storage.js'
import type { CookieOptions, SessionStorage } from './storage.js'

const ALGORITHM = 'aes-256-gcm'
const KEY_BYTES = 32
const IV_BYTES = 16
const TAG_BYTES = 16
const ASSOCIATED_DATA = Buffer.from('weft-session')

interface EncryptedCookieOptions {
  /** 32 bytes, as a Buffer or a base64 string. */
  key?: Buffer | string
  cookieOptions?: CookieOptions
  logger?: bole.Logger
}

/**
 * Keeps the session AES-256-GCM encrypted in `_aino_session`, as
 * `ciphertext.iv.tag` (each part unpadded base64url). The client can neither
 * read nor change it.
 */
class EncryptedCookieStorage implements SessionStorage {
  private key: Buffer
  private cookieOptions: CookieOptions
  private logger: bole.Logger

  constructor ({
    key = process.env.SESSION_KEY,
    cookieOptions = {},
    logger = bole('weft:session'),
  }: EncryptedCookieOptions = {}) {
    if (key === undefined) {
      throw new TypeError('`key` must be a buffer or a base64 string, got undefined')
    }

    const buffer = Buffer.isBuffer(key) ? key : Buffer.from(key, 'base64')
    if (buffer.length !== KEY_BYTES) {
      throw new RangeError(`\`key\` must be exactly ${KEY_BYTES} bytes long, got ${buffer.length}`)
    }

    this.key = buffer
    this.cookieOptions = cookieOptions
    this.logger = logger
  }

  encrypt (data: string) {
    const iv = crypto.randomBytes(IV_BYTES)
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_BYTES })
    cipher.setAAD(ASSOCIATED_DATA)
    const ciphertext = Buffer.concat([cipher.update(data, 'utf8'), cipher.final()])
    const tag = cipher.getAuthTag()

    return [ciphertext, iv, tag].map(part => part.toString('base64url')).join('.')
  }

  /** Returns `null` for anything that does not decrypt and authenticate. */
  decrypt (blob: string): string | null {
    const parts = blob.split('.')
    if (parts.length !== 3) {
      return null
    }

    const [ciphertext, iv, tag] = parts.map(part => Buffer.from(part, 'base64url'))
    if (iv.length !== IV_BYTES || tag.length !== TAG_BYTES) {
      return null
    }

    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_BYTES })
      decipher.setAAD(ASSOCIATED_DATA)
      decipher.setAuthTag(tag)
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8')
    } catch (err) {
      this.logger.debug({ err }, 'session cookie failed to authenticate')
      return null
    }
  }

  decode (context: Context) {
    const blob = requestCookies(context)[SESSION_COOKIE]
    if (blob === undefined) {
      context.session = new Session()
      return context
    }

    const data = this.decrypt(blob)
    const session = data === null ? null : Session.parse(data)
    if (!session) {
      this.logger.warn(`removing session that failed to decrypt; request_id="${context.id}"`)
    }
    context.session = session || new Session()
    return context
  }

  encode (context: Context) {
    return setCookie(context, SESSION_COOKIE, this.encrypt(stamped(context)), this.cookieOptions)
  }
}

export { EncryptedCookieStorage }
export type { EncryptedCookieOptions }
