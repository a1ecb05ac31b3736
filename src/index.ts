export { Context } from './data/context.js'
export type {
  ContextConfig,
  HeaderPair,
  InboundRequest,
  JsonObject,
  JsonValue,
  ResponseBody,
} from './data/context.js'
export { Session } from './data/session.js'
export * from './data/errors.js'
export { STATUS } from './core/prelude.js'

export { reduce, flatten, ignoreHalt } from './core/middleware.js'
export type { Middleware, MiddlewareOptions, ConfiguredMiddleware, MiddlewareConfig } from './core/middleware.js'
export { parseKey, parseParams } from './core/params.js'
export type { ParamObject, ParamValue } from './core/params.js'
export { buildBodyParser, parseContentType } from './core/body.js'
export type { BodyInput, BodyParser, BodyParserDefinition, ContentType } from './core/body.js'
export { json } from './body/json.js'
export { urlEncoded } from './body/urlencoded.js'

export {
  route,
  get,
  post,
  put,
  patch,
  del,
  checkPath,
  pathFor,
  urlFor,
  routeTable,
} from './core/routes.js'
export type { Method, PathParams, Route, RouteDescription, RouteList, Segment } from './core/routes.js'
export { bindRoutes, setRoutes, matchRoute, handleRoute } from './middleware/route.js'

export * as normalize from './middleware/normalize.js'
export { common, params } from './middleware/normalize.js'
export * as response from './core/response.js'
export * as session from './middleware/session.js'
export * as flash from './middleware/flash.js'
export * as csrf from './middleware/csrf.js'
export { SignedCookieStorage } from './session/signed-cookie.js'
export type { SignedCookieOptions } from './session/signed-cookie.js'
export { EncryptedCookieStorage } from './session/encrypted-cookie.js'
export type { EncryptedCookieOptions } from './session/encrypted-cookie.js'
export type { CookieOptions, SessionStorage } from './session/storage.js'

export { log } from './middleware/log.js'
export { inspect } from './middleware/dev.js'
export { applyHeaders, applyXFO } from './middleware/apply-headers.js'
export type { XFOMode } from './middleware/apply-headers.js'

export { createHandler, respond } from './core/handler.js'
export type { HandlerOptions, RequestHandler, ResponseTriple } from './core/handler.js'
export { requestListener, runserver } from './bin/runserver.js'
