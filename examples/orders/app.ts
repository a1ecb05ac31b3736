import {
  Context,
  bindRoutes,
  common,
  csrf,
  del,
  flash,
  get,
  handleRoute,
  ignoreHalt,
  matchRoute,
  params,
  pathFor,
  post,
  response,
  session,
  applyXFO,
} from '../../src/index.js'
import type { MiddlewareConfig, SessionStorage } from '../../src/index.js'

interface Order {
  id: number
  item: string
}

class OrderBook {
  private orders = new Map<number, Order>()
  private nextId = 1

  list () {
    return [...this.orders.values()]
  }

  find (id: number) {
    return this.orders.get(id)
  }

  add (item: string) {
    const order = { id: this.nextId++, item }
    this.orders.set(order.id, order)
    return order
  }

  remove (id: number) {
    return this.orders.delete(id)
  }
}

function escapeHtml (value: string) {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

function orderId (context: Context) {
  const id = Number(context.params?.id)
  return Number.isInteger(id) ? id : NaN
}

function notice (context: Context) {
  const message = flash.get(context, 'notice')
  return message ? [`<p class="notice">${escapeHtml(message)}</p>`] : []
}

function notFound (context: Context) {
  response.status(context, 404)
  return response.html(context, 'Not found')
}

function createRoutes (orders: OrderBook) {
  function index (context: Context) {
    const items = orders.list().map(
      order => `<li><a href="${pathFor(context, 'order', { id: order.id })}">${escapeHtml(order.item)}</a></li>`
    )

    response.status(context, 200)
    return response.html(context, [
      ...notice(context),
      `<ul>${items.join('')}</ul>`,
      `<form method="post" action="${pathFor(context, 'orders')}">`,
      `<input type="hidden" name="csrf_token" value="${csrf.getToken(context)}">`,
      '<input name="item"><button>Order</button></form>',
    ].join('\n'))
  }

  function show (context: Context) {
    const order = orders.find(orderId(context))
    if (!order) {
      return notFound(context)
    }

    response.status(context, 200)
    return response.html(context, [
      ...notice(context),
      `<h1>${escapeHtml(order.item)}</h1>`,
      `<form method="post" action="${pathFor(context, 'order', { id: order.id })}">`,
      '<input type="hidden" name="_method" value="delete">',
      `<input type="hidden" name="csrf_token" value="${csrf.getToken(context)}">`,
      '<button>Cancel</button></form>',
    ].join('\n'))
  }

  function create (context: Context) {
    const item = context.params?.item
    if (typeof item !== 'string' || item.trim() === '') {
      response.status(context, 422)
      return response.html(context, 'An order needs an item')
    }

    const order = orders.add(item.trim())
    flash.put(context, 'notice', `Order ${order.id} placed`)
    return response.redirect(context, pathFor(context, 'order', { id: order.id }))
  }

  function cancel (context: Context) {
    const id = orderId(context)
    if (!orders.remove(id)) {
      return notFound(context)
    }

    flash.put(context, 'notice', `Order ${id} cancelled`)
    return response.redirect(context, pathFor(context, 'home'))
  }

  return [
    get('/', index, 'home'),
    [
      post('/orders', create, 'orders'),
      get('/orders/:id', show, 'order'),
      del('/orders/:id', cancel),
    ],
  ]
}

/**
 * The whole request pipeline for the order desk: normalize, load the session,
 * route, guard forms, run the route, then persist the session.
 */
function createApp ({
  storage,
  orders = new OrderBook(),
}: {
  storage: SessionStorage
  orders?: OrderBook
}): MiddlewareConfig {
  return [
    common(),
    session.config(storage),
    session.decode,
    flash.load,
    bindRoutes(createRoutes(orders)),
    matchRoute,
    params,
    csrf.check,
    csrf.set,
    handleRoute,
    ignoreHalt(session.encode),
    applyXFO('DENY'),
  ]
}

export { createApp, OrderBook }
export type { Order }
