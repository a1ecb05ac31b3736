import type { Context } from '../data/context.js'
import { FlashNotLoadedError } from '../data/errors.js'
import { _isJsonObject } from '../core/utils/index.js'

const FLASH_KEY = 'aino_flash'

/**
 * Store a one-shot message for the next request that runs `load`. Needs a
 * decoded session.
 */
function put (context: Context, key: string, value: string) {
  if (typeof value !== 'string') {
    throw new TypeError('flash messages must be strings, got ' + typeof value)
  }

  const stored = context.session.get(FLASH_KEY)
  const messages = _isJsonObject(stored) ? stored : {}
  context.session.set(FLASH_KEY, { ...messages, [key]: value })
  return context
}

function load (context: Context) {
  const stored = context.session.get(FLASH_KEY)
  context.session.delete(FLASH_KEY)

  const flash: Record<string, string> = {}
  if (_isJsonObject(stored)) {
    for (const [key, value] of Object.entries(stored)) {
      if (typeof value === 'string') {
        flash[key] = value
      }
    }
  }
  context.flash = flash
  return context
}

function get (context: Context, key: string): string | undefined {
  if (!context.flash) {
    throw new FlashNotLoadedError()
  }
  return Object.hasOwn(context.flash, key) ? context.flash[key] : undefined
}

export { put, load, get, FLASH_KEY }
