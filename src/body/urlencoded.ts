import type { BodyParser, BodyInput } from '../core/body.js'
import { parseParams } from '../core/params.js'

function urlEncoded (next: BodyParser): BodyParser {
  return (input: BodyInput) => {
    if (
      input.contentType.type !== 'application' ||
      input.contentType.subtype !== 'x-www-form-urlencoded'
    ) {
      return next(input)
    }

    // URLSearchParams never throws on malformed input, so neither does this.
    return parseParams(input.body)
  }
}

export { urlEncoded }
