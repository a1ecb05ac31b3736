import type { Context, HeaderPair, ResponseBody } from '../data/context.js'

function status (context: Context, code: number) {
  context.responseStatus = code
  return context
}

/** Append a response header. Existing values for `name` are kept. */
function header (context: Context, name: string, value: string) {
  context.responseHeaders = [...(context.responseHeaders || []), [name, value]]
  return context
}

/** Replace every response header. */
function headers (context: Context, pairs: HeaderPair[]) {
  context.responseHeaders = [...pairs]
  return context
}

function body (context: Context, value: ResponseBody) {
  context.responseBody = value
  return context
}

function html (context: Context, markup: string) {
  return body(header(context, 'Content-Type', 'text/html'), markup)
}

function redirect (context: Context, url: string) {
  status(context, 302)
  header(context, 'Content-Type', 'text/html')
  header(context, 'Location', url)
  return body(context, 'Redirecting...')
}

function halt (context: Context) {
  context.halt = true
  return context
}

export { status, header, headers, body, html, redirect, halt }
