import type { JsonValue } from '../data/context.js'

interface ContentType {
  vnd: string
  type: string
  subtype: string
  charset: string
  params: Map<string, string>
}

interface BodyInput {
  body: string
  contentType: ContentType
}

interface BodyParser {
  (input: BodyInput): JsonValue | undefined
}

interface BodyParserDefinition {
  (next: BodyParser): BodyParser
}

/**
 * Chain body parsers so that each one either claims the input or hands it to
 * the next. When nothing claims it the result is `undefined`.
 */
function buildBodyParser (bodyParsers: BodyParserDefinition[]): BodyParser {
  return bodyParsers.reduceRight(
    (next: BodyParser, parser: BodyParserDefinition) => parser(next),
    () => undefined
  )
}

function parseContentType (header: string | undefined): ContentType {
  const [mediaType, ...attrs] = (header || 'application/octet-stream')
    .split(';')
    .map(xs => xs.trim())

  const params = new Map<string, string>()
  for (const attr of attrs) {
    const [name, value = ''] = attr.split('=').map(ys => ys.trim())
    if (name) {
      params.set(name.toLowerCase(), value)
    }
  }

  const charset = (params.get('charset') || 'utf-8').replace(/^("(.*)")|('(.*)')$/, '$2$4').toLowerCase()
  const [type, vndsubtype = ''] = mediaType.toLowerCase().split('/')
  const subtypeParts = vndsubtype.split('+')
  const subtype = subtypeParts.pop() || ''

  return {
    vnd: subtypeParts.join('+'),
    type,
    subtype,
    charset,
    params
  }
}

export { buildBodyParser, parseContentType }
export type { ContentType, BodyInput, BodyParser, BodyParserDefinition }
