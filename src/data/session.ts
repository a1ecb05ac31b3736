import type { JsonObject, JsonValue } from './context.js'
import { _isJsonObject } from '../core/utils/index.js'

class Session extends Map<string, JsonValue> {
  public dirty = false

  set (key: string, value: JsonValue) {
    const old = this.get(key)
    if (value === old && this.has(key)) {
      return super.set(key, value)
    }
    this.dirty = true
    return super.set(key, value)
  }

  delete (key: string) {
    if (!this.has(key)) {
      return super.delete(key)
    }
    this.dirty = true
    return super.delete(key)
  }

  clear () {
    this.dirty = true
    super.clear()
  }

  toJSON (): JsonObject {
    return Object.fromEntries(this)
  }

  // Returns null for anything that is not a JSON object, so callers can
  // decide how loudly to complain.
  static parse (data: string): Session | null {
    let parsed: JsonValue
    try {
      parsed = JSON.parse(data)
    } catch {
      return null
    }

    if (!_isJsonObject(parsed)) {
      return null
    }
    return new Session(Object.entries(parsed))
  }
}

export { Session }
