import { STATUS } from '../core/prelude.js'

// Everything in here signals a wiring mistake in the application, never a
// condition a well-formed pipeline hits at runtime.
class WiringError extends Error {
  [STATUS]: number

  constructor (message: string, status = 500) {
    super(message)
    this.name = new.target.name
    this[STATUS] = status
  }
}

class SessionNotLoadedError extends WiringError {
  constructor () {
    super('Session data has not been decoded yet; run the session decode middleware before using context.session')
  }
}

class SessionConfigMissingError extends WiringError {
  constructor () {
    super('No session storage configured; run the session config middleware before decoding or encoding sessions')
  }
}

class FlashNotLoadedError extends WiringError {
  constructor () {
    super('Flash messages have not been loaded; run flash.load before reading them')
  }
}

class MissingContextFieldError extends WiringError {
  public field: string

  constructor (field: string, producer: string) {
    super(`context.${field} is not set; run the ${producer} middleware first`)
    this.field = field
  }
}

class UnknownRouteError extends WiringError {
  public routeName: string

  constructor (routeName: string) {
    super(`No route named "${routeName}"`)
    this.routeName = routeName
  }
}

class MissingPathParamError extends WiringError {
  constructor (routeName: string, param: string) {
    super(`Route "${routeName}" needs a value for :${param}`)
  }
}

class MissingCsrfTokenError extends WiringError {
  constructor () {
    super('No CSRF token in the session; run csrf.set before rendering forms')
  }
}

class IncompleteResponseError extends WiringError {
  public missing: string[]

  constructor (missing: string[]) {
    super(`Context is missing required response fields: ${missing.join(', ')}`)
    this.missing = missing
  }
}

class MiddlewareContractError extends WiringError {
  constructor (name: string) {
    super(`Middleware ${name || '<anonymous>'} did not return a context`)
  }
}

export {
  WiringError,
  SessionNotLoadedError,
  SessionConfigMissingError,
  FlashNotLoadedError,
  MissingContextFieldError,
  UnknownRouteError,
  MissingPathParamError,
  MissingCsrfTokenError,
  IncompleteResponseError,
  MiddlewareContractError,
}
