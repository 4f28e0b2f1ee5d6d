// Loads the cookie session once per request into c.var.session

import { createMiddleware } from 'hono/factory'
import type { Session, SessionStore } from './interfaces/session-store'
import { honoCookies } from './adapters/hono-cookies'

export type SessionEnv = {
  Variables: {
    session: Session
  }
}

export function sessionMiddleware(store: SessionStore) {
  return createMiddleware<SessionEnv>(async (c, next) => {
    const lookup = store.load(honoCookies(c))

    // Reasons stay in the server log; the client only ever sees an anonymous session
    if (lookup.status === 'anonymous' && lookup.reason !== 'missing') {
      console.debug(`[session] Discarded ${store.name} cookie: ${lookup.reason}`)
    }

    c.set('session', lookup.session)
    await next()
  })
}
