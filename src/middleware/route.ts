import type { Context } from '../data/context.js'
import { MissingContextFieldError } from '../data/errors.js'
import { reduce } from '../core/middleware.js'
import type { Middleware } from '../core/middleware.js'
import { findRoute } from '../core/routes.js'
import type { RouteList } from '../core/routes.js'
import { body, halt, header, status } from '../core/response.js'

function setRoutes (context: Context, routes: RouteList) {
  context.routes = routes
  return context
}

function bindRoutes (routes: RouteList): Middleware {
  return function routesMiddleware (context: Context) {
    return setRoutes(context, routes)
  }
}

/**
 * Find the first route, in declaration order, whose method and path fit the
 * request. A miss answers 404 and halts the pipeline.
 */
function matchRoute (context: Context) {
  if (!context.routes) {
    throw new MissingContextFieldError('routes', 'bindRoutes')
  }
  if (context.method === undefined) {
    throw new MissingContextFieldError('method', 'method')
  }
  if (context.path === undefined) {
    throw new MissingContextFieldError('path', 'path')
  }

  const match = findRoute(context.routes, context.method, context.path)
  if (!match) {
    halt(context)
    status(context, 404)
    header(context, 'Content-Type', 'text/html')
    return body(context, 'Not found')
  }

  context.pathParams = match.pathParams
  context.routeMiddleware = match.route.middleware
  return context
}

function handleRoute (context: Context) {
  if (context.routeMiddleware === undefined) {
    return context
  }
  return reduce(context, context.routeMiddleware)
}

export { bindRoutes, setRoutes, matchRoute, handleRoute }
