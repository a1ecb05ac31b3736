type ParamValue = string | ParamValue[] | ParamObject

interface ParamObject {
  [key: string]: ParamValue
}

// Names that would reach Object.prototype if assigned through brackets.
const UNSAFE_KEYS = new Set(['__proto__', 'constructor', 'prototype'])

/**
 * Split a raw parameter key into its path. `''` stands for `[]`, the "append"
 * marker: `user[tags][]` becomes `['user', 'tags', '']`.
 *
 * Keys that do not follow the bracket grammar (`a[b`, `[a]`, `a[b]c`) are
 * returned whole, as a single literal segment.
 */
function parseKey (key: string): string[] {
  const open = key.indexOf('[')
  if (open <= 0) {
    return [key]
  }

  const path = [key.slice(0, open)]
  let rest = key.slice(open)
  while (rest.length) {
    const match = /^\[([^[\]]*)\]/.exec(rest)
    if (!match) {
      return [key]
    }
    path.push(match[1])
    rest = rest.slice(match[0].length)
  }
  return path
}

function parseParams (input: string): ParamObject {
  const result: ParamObject = {}
  for (const [key, value] of new URLSearchParams(input)) {
    const [head, ...rest] = parseKey(key)
    if (!head || [head, ...rest].some(segment => UNSAFE_KEYS.has(segment))) {
      continue
    }
    result[head] = insert(own(result, head), rest, value)
  }
  return result
}

function insert (current: ParamValue | undefined, path: string[], value: string): ParamValue {
  if (path.length === 0) {
    return value
  }

  const [segment, ...rest] = path
  if (segment === '') {
    const list = Array.isArray(current) ? current : []
    list.push(insert(undefined, rest, value))
    return list
  }

  const object: ParamObject = typeof current === 'object' && !Array.isArray(current) ? current : {}
  object[segment] = insert(own(object, segment), rest, value)
  return object
}

function own (object: ParamObject, key: string): ParamValue | undefined {
  return Object.hasOwn(object, key) ? object[key] : undefined
}

export { UNSAFE_KEYS, parseKey, parseParams }
export type { ParamValue, ParamObject }
