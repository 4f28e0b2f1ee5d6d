// Standalone Node.js server entry point
// Run with: npx tsx src/server/standalone.ts
//
// Required environment:
//   SESSION_SECRET       secret the cookie key is derived from
// Optional:
//   SESSION_COOKIE_NAME  (default: session)
//   SESSION_TTL          seconds or 30m / 12h / 7d (default: 7d)
//   SESSION_HTTP_ONLY    (default: true)
//   SESSION_SECURE       (default: true)
//   PORT                 (default: 3000)

import { serve } from '@hono/node-server'
import { createApp, type AppContext } from './app'
import { loadConfig } from './config'
import { CookieSessionStore } from './adapters/cookie-session-store'
import { uuidIdentifiers } from './adapters/uuid-identifiers'

function main() {
  const result = loadConfig(process.env)
  if (!result.ok) {
    console.error('Invalid configuration:')
    for (const error of result.errors) {
      console.error(`  ${error}`)
    }
    process.exit(1)
  }

  const { config } = result

  const sessions = new CookieSessionStore({
    name: config.cookieName,
    secret: config.secret,
    ttl: config.ttl,
    httpOnly: config.httpOnly,
    secure: config.secure,
    ids: uuidIdentifiers,
  })

  const context: AppContext = { sessions, ids: uuidIdentifiers }
  const app = createApp(context, { logRequests: true })

  console.log(`[server] Session cookie "${config.cookieName}", TTL ${config.ttl}s`)

  serve({
    fetch: app.fetch,
    port: config.port,
  }, (info) => {
    console.log(`[server] Running at http://localhost:${info.port}`)
  })
}

main()
