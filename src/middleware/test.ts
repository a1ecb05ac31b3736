import { inject } from '@hapi/shot'
import type { Test } from 'tap'

import type { ContextConfig, JsonObject } from '../data/context.js'
import type { MiddlewareConfig } from '../core/middleware.js'
import { requestListener } from '../bin/runserver.js'

type ShotResponse = Awaited<ReturnType<typeof inject>>

interface TestRequestOptions {
  method?: string
  url?: string
  headers?: Record<string, string>
  /** Plain objects are sent as JSON. */
  payload?: string | Buffer | JsonObject
  remoteAddress?: string
}

type WeftTest = Test & {
  request(opts?: TestRequestOptions): Promise<ShotResponse>
}

/**
 * Wrap a tap test body so that `t.request()` drives the given middleware
 * in-process, without binding a port:
 *
 * ```ts
 * const _ = test({ middleware: [common(), bindRoutes(routes), matchRoute, handleRoute] })
 * t.test('home page renders', _(async t => {
 *   const response = await t.request({ url: '/' })
 *   t.equal(response.statusCode, 200)
 * }))
 * ```
 */
function test ({
  middleware,
  config = {},
}: {
  middleware: MiddlewareConfig
  config?: Partial<ContextConfig>
}) {
  const onrequest = requestListener({ middleware, config })

  return (inner: (t: WeftTest) => Promise<unknown> | unknown) => {
    return async (outer: Test) => {
      const request = async ({
        method = 'GET',
        url = '/',
        headers = {},
        payload,
        remoteAddress,
      }: TestRequestOptions = {}) => {
        const requestHeaders = { ...headers }
        let body: string | Buffer | undefined
        if (payload === undefined || typeof payload === 'string' || Buffer.isBuffer(payload)) {
          body = payload
        } else {
          body = JSON.stringify(payload)
          requestHeaders['content-type'] = 'application/json'
        }

        return inject(onrequest, {
          method,
          url,
          headers: requestHeaders,
          ...(body === undefined ? {} : { payload: body }),
          ...(remoteAddress ? { remoteAddress } : {}),
        })
      }

      return inner(Object.assign(outer, { request }))
    }
  }
}

export { test }
export type { WeftTest, TestRequestOptions, ShotResponse }
