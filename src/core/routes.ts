import type { Context } from '../data/context.js'
import { MissingContextFieldError, MissingPathParamError, UnknownRouteError } from '../data/errors.js'
import type { MiddlewareConfig } from './middleware.js'

type Method = 'get' | 'head' | 'post' | 'put' | 'patch' | 'delete' | 'options' | 'connect' | 'trace'

type Segment = string | { param: string }

interface Route {
  readonly method: Method
  readonly path: readonly Segment[]
  readonly middleware: MiddlewareConfig
  readonly name?: string
}

type RouteList = ReadonlyArray<Route | RouteList>

interface RouteDescription {
  method: Method
  pattern: string
  name?: string
}

type PathParams = Record<string, string | number | boolean>

function route (method: Method, pattern: string, middleware: MiddlewareConfig, name?: string): Route {
  const path = pattern
    .split('/')
    .filter(Boolean)
    .map((segment): Segment => segment.startsWith(':') ? { param: segment.slice(1) } : segment)

  return Object.freeze({
    method,
    path: Object.freeze(path),
    middleware,
    ...(name ? { name } : {})
  })
}

function get (pattern: string, middleware: MiddlewareConfig, name?: string) {
  return route('get', pattern, middleware, name)
}

function post (pattern: string, middleware: MiddlewareConfig, name?: string) {
  return route('post', pattern, middleware, name)
}

function put (pattern: string, middleware: MiddlewareConfig, name?: string) {
  return route('put', pattern, middleware, name)
}

function patch (pattern: string, middleware: MiddlewareConfig, name?: string) {
  return route('patch', pattern, middleware, name)
}

// `delete` is a reserved word.
function del (pattern: string, middleware: MiddlewareConfig, name?: string) {
  return route('delete', pattern, middleware, name)
}

function * flattenRoutes (routes: RouteList): Generator<Route> {
  for (const entry of routes) {
    if (isRoute(entry)) {
      yield entry
    } else {
      yield * flattenRoutes(entry)
    }
  }
}

function isRoute (entry: Route | RouteList): entry is Route {
  return 'method' in entry
}

/**
 * Match request path segments against a route pattern. Returns the bound
 * placeholders, or `null` when the path does not fit.
 */
function checkPath (segments: readonly string[], pattern: readonly Segment[]): Record<string, string> | null {
  if (segments.length !== pattern.length) {
    return null
  }

  const params: Record<string, string> = {}
  for (const [idx, expected] of pattern.entries()) {
    const actual = segments[idx]
    if (typeof expected === 'string') {
      if (expected !== actual) {
        return null
      }
    } else {
      params[expected.param] = actual
    }
  }
  return params
}

function findRoute (routes: RouteList, method: string, segments: readonly string[]) {
  for (const candidate of flattenRoutes(routes)) {
    if (candidate.method !== method) {
      continue
    }
    const pathParams = checkPath(segments, candidate.path)
    if (pathParams) {
      return { route: candidate, pathParams }
    }
  }
  return null
}

function findNamed (routes: RouteList, name: string) {
  for (const candidate of flattenRoutes(routes)) {
    if (candidate.name === name) {
      return candidate
    }
  }
  throw new UnknownRouteError(name)
}

function buildPath (target: Route, params: PathParams = {}) {
  const name = target.name || ''
  const leftover = new Map(Object.entries(params))

  const segments = target.path.map(segment => {
    if (typeof segment === 'string') {
      return encodeURIComponent(segment)
    }
    const value = leftover.get(segment.param)
    if (value === undefined) {
      throw new MissingPathParamError(name, segment.param)
    }
    leftover.delete(segment.param)
    return encodeURIComponent(String(value))
  })

  const query = new URLSearchParams([...leftover].map(([key, value]): [string, string] => [key, String(value)])).toString()
  return `/${segments.join('/')}${query ? `?${query}` : ''}`
}

const DEFAULT_PORTS: Record<string, number> = { http: 80, https: 443 }

function pathFor (context: Context, name: string, params?: PathParams) {
  if (!context.routes) {
    throw new MissingContextFieldError('routes', 'bindRoutes')
  }
  return buildPath(findNamed(context.routes, name), params)
}

function urlFor (context: Context, name: string, params?: PathParams) {
  const { scheme, host, port } = context.config
  const authority = port && port !== DEFAULT_PORTS[scheme] ? `${host}:${port}` : host
  return `${scheme}://${authority}${pathFor(context, name, params)}`
}

function routeTable (routes: RouteList): RouteDescription[] {
  return [...flattenRoutes(routes)].map(({ method, path, name }) => ({
    method,
    pattern: '/' + path.map(segment => typeof segment === 'string' ? segment : `:${segment.param}`).join('/'),
    ...(name ? { name } : {})
  }))
}

export {
  route,
  get,
  post,
  put,
  patch,
  del,
  flattenRoutes,
  checkPath,
  findRoute,
  buildPath,
  pathFor,
  urlFor,
  routeTable,
}
export type { Method, Segment, Route, RouteList, RouteDescription, PathParams }
