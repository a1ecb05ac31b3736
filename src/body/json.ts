import bole from 'bole'

import type { BodyParser, BodyInput } from '../core/body.js'

const logger = bole('weft:body')

function json (next: BodyParser): BodyParser {
  return (input: BodyInput) => {
    if (
      input.contentType.type !== 'application' ||
      input.contentType.subtype !== 'json'
    ) {
      return next(input)
    }

    try {
      return JSON.parse(input.body)
    } catch (err) {
      logger.debug({ err }, 'Could not parse request body as JSON')
      return undefined
    }
  }
}

export { json }
