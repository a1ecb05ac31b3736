import { IncomingMessage } from 'node:http'
import crypto from 'node:crypto'

import type { JsonObject, JsonValue } from '../../data/context.js'

async function _collect (request: IncomingMessage) {
  const acc: Buffer[] = []
  for await (const chunk of request) {
    acc.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(acc)
}

function _safeEqual (lhs: string, rhs: string) {
  const left = Buffer.from(lhs)
  const right = Buffer.from(rhs)
  if (left.length !== right.length) {
    return false
  }
  return crypto.timingSafeEqual(left, right)
}

function _isJsonObject (value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export { _collect, _safeEqual, _isJsonObject }
