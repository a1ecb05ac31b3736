import bole from 'bole'

import { SignedCookieStorage, log, runserver } from '../../src/index.js'
import { createApp } from './app.js'

// SESSION_SECRET and SESSION_SALT configure the session cookie signature.
const server = runserver({
  middleware: [createApp({ storage: new SignedCookieStorage() }), log()],
})

const port = Number(process.env.PORT) || 8000
server.listen(port, () => {
  bole('weft:server').info(`now listening on port ${port}`)
})
