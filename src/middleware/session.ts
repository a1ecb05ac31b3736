import type { Context } from '../data/context.js'
import { SessionConfigMissingError } from '../data/errors.js'
import type { Middleware } from '../core/middleware.js'
import type { SessionStorage } from '../session/storage.js'

function setSessionConfig (context: Context, storage: SessionStorage) {
  context.sessionConfig = storage
  return context
}

/** Pick the storage that `decode` and `encode` will use for this request. */
function config (storage: SessionStorage): Middleware {
  return function sessionConfig (context: Context) {
    return setSessionConfig(context, storage)
  }
}

function storageFor (context: Context) {
  if (!context.sessionConfig) {
    throw new SessionConfigMissingError()
  }
  return context.sessionConfig
}

function decode (context: Context) {
  return storageFor(context).decode(context)
}

/**
 * Write the session back out, but only when something changed it. Mount it
 * with `ignoreHalt` so that halted requests (a redirect after a form post,
 * say) still persist what they stored.
 */
function encode (context: Context) {
  if (!context.sessionUpdated) {
    return context
  }
  return storageFor(context).encode(context)
}

export { config, decode, encode, setSessionConfig }
