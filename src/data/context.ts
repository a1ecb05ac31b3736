import { v4 as uuidv4 } from 'uuid'

import type { MiddlewareConfig } from '../core/middleware.js'
import type { ParamObject } from '../core/params.js'
import type { RouteList } from '../core/routes.js'
import type { SessionStorage } from '../session/storage.js'
import { SessionNotLoadedError } from './errors.js'
import { Session } from './session.js'

type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject

interface JsonObject {
  [key: string]: JsonValue
}

type HeaderPair = [name: string, value: string]

type ResponseBody = string | Buffer

/** What the host server hands over for each request. */
interface InboundRequest {
  method: string
  path: string
  /** The raw query string, without the leading `?`. */
  query: string
  headers: HeaderPair[]
  body: string | Buffer
  remote?: string
  host?: string
}

interface ContextConfig {
  scheme: string
  host: string
  port?: number
  environment: string
}

function defaultConfig (): ContextConfig {
  const port = Number(process.env.URL_PORT)
  return {
    scheme: process.env.URL_SCHEME || 'http',
    host: process.env.URL_HOST || 'localhost',
    ...(port ? { port } : {}),
    environment: process.env.NODE_ENV || 'development',
  }
}

class Context {
  private _session?: Session

  public id: string
  public start: number
  public config: ContextConfig

  /** Application data. Lookups are unchecked; narrow what you read. */
  public assigns: Record<string, unknown> = {}

  public method?: string
  public path?: string[]
  public headers?: HeaderPair[]
  public cookies?: Record<string, string>
  public queryParams?: ParamObject
  public parsedBody?: JsonValue
  public pathParams?: Record<string, string>
  public params?: JsonObject

  public routes?: RouteList
  public routeMiddleware?: MiddlewareConfig

  public sessionConfig?: SessionStorage
  public flash?: Record<string, string>

  public halt = false

  public responseStatus?: number
  public responseHeaders?: HeaderPair[]
  public responseBody?: ResponseBody

  constructor (public request: InboundRequest, config: Partial<ContextConfig> = {}) {
    this.start = Date.now()
    this.config = { ...defaultConfig(), ...config }
    const [requestId] = rawHeader(request.headers, 'x-request-id')
    this.id = requestId || uuidv4()
  }

  get session (): Session {
    if (!this._session) {
      throw new SessionNotLoadedError()
    }
    return this._session
  }

  set session (value: Session) {
    this._session = value
  }

  get hasSession () {
    return Boolean(this._session)
  }

  get sessionUpdated () {
    return this._session ? this._session.dirty : false
  }

  /** Every value sent for `name`, in request order. */
  requestHeader (name: string): string[] {
    return rawHeader(this.headers || this.request.headers, name)
  }
}

function rawHeader (headers: HeaderPair[], name: string) {
  const wanted = name.toLowerCase()
  return headers
    .filter(([header]) => header.toLowerCase() === wanted)
    .map(([, value]) => value)
}

export { Context }
export type {
  ContextConfig,
  HeaderPair,
  InboundRequest,
  JsonObject,
  JsonValue,
  ResponseBody,
}
