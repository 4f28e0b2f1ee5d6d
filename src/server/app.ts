// Hono application exposing the cookie session lifecycle
// Runs on Node.js (the store uses node:crypto); see standalone.ts for the entry point.

import { Hono, type Context } from 'hono'
import { logger } from 'hono/logger'
import type { Session, SessionStore } from './interfaces/session-store'
import type { IdentifierScheme } from './interfaces/identifiers'
import { honoCookies } from './adapters/hono-cookies'
import { sessionMiddleware } from './session-middleware'

// Context type for handlers
export interface AppContext {
  sessions: SessionStore
  ids: IdentifierScheme
}

export interface AppOptions {
  logRequests?: boolean
}

// What the client gets to see of its session
export interface SessionView {
  authenticated: boolean
  impersonating: boolean
  sessionId: string
  userId: string | null
  realUserId: string | null
  state: string
  savedAt: string | null
}

type Variables = {
  ctx: AppContext
  session: Session
}

type AppEnv = { Variables: Variables }

export function toSessionView(session: Session, ids: IdentifierScheme): SessionView {
  const authenticated = session.valid && session.uid !== ids.nil
  return {
    authenticated,
    impersonating: authenticated && session.realUid !== ids.nil,
    sessionId: session.sid,
    userId: authenticated ? session.uid : null,
    realUserId: authenticated && session.realUid !== ids.nil ? session.realUid : null,
    state: new TextDecoder().decode(session.state),
    savedAt: session.valid ? session.time.toISOString() : null,
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

async function readBody(c: Context<AppEnv>): Promise<Record<string, unknown> | null> {
  try {
    const body: unknown = await c.req.json()
    return isRecord(body) ? body : null
  } catch {
    return null
  }
}

// Returns an error response when the session could not be written
function persist(c: Context<AppEnv>, session: Session): Response | null {
  const ctx = c.get('ctx')
  try {
    ctx.sessions.save(honoCookies(c), session)
    return null
  } catch (error) {
    console.error('[session] Failed to save session:', error)
    return c.json({ error: 'Failed to save session' }, 500)
  }
}

export function createApp(context: AppContext, options: AppOptions = {}) {
  const app = new Hono<AppEnv>()

  if (options.logRequests) {
    app.use('*', logger())
  }

  // Attach context to all requests
  app.use('*', async (c, next) => {
    c.set('ctx', context)
    await next()
  })

  app.use('/api/*', sessionMiddleware(context.sessions))

  // null when the body has no well-formed userId
  const readUserId = async (c: Context<AppEnv>): Promise<string | null> => {
    const body = await readBody(c)
    const userId = body?.userId
    if (typeof userId !== 'string' || !context.ids.isValid(userId)) return null
    return userId.toLowerCase()
  }

  // ============ SESSION ROUTES ============

  app.get('/api/session', (c) => {
    return c.json(toSessionView(c.get('session'), context.ids))
  })

  // Credential checks happen upstream; this only records who the user is
  app.post('/api/session/login', async (c) => {
    const userId = await readUserId(c)
    if (!userId) {
      return c.json({ error: 'A valid userId is required' }, 400)
    }

    const session = c.get('session')
    session.uid = userId
    session.realUid = context.ids.nil

    const failed = persist(c, session)
    if (failed) return failed

    return c.json({ success: true, sessionId: session.sid })
  })

  app.post('/api/session/impersonate', async (c) => {
    const session = c.get('session')
    if (!toSessionView(session, context.ids).authenticated) {
      return c.json({ error: 'Unauthorized' }, 401)
    }

    const userId = await readUserId(c)
    if (!userId) {
      return c.json({ error: 'A valid userId is required' }, 400)
    }

    // Nested impersonation keeps the original identity
    if (session.realUid === context.ids.nil) {
      session.realUid = session.uid
    }
    session.uid = userId

    const failed = persist(c, session)
    if (failed) return failed

    return c.json({ success: true, sessionId: session.sid })
  })

  app.post('/api/session/release', (c) => {
    const session = c.get('session')
    if (!toSessionView(session, context.ids).impersonating) {
      return c.json({ error: 'Not impersonating' }, 400)
    }

    session.uid = session.realUid
    session.realUid = context.ids.nil

    const failed = persist(c, session)
    if (failed) return failed

    return c.json({ success: true, sessionId: session.sid })
  })

  app.put('/api/session/state', async (c) => {
    const body = await readBody(c)
    const state = body?.state
    if (typeof state !== 'string') {
      return c.json({ error: 'state must be a string' }, 400)
    }

    const session = c.get('session')
    session.state = new TextEncoder().encode(state)

    const failed = persist(c, session)
    if (failed) return failed

    return c.json({ success: true, sessionId: session.sid })
  })

  app.post('/api/session/logout', (c) => {
    context.sessions.clear(honoCookies(c))
    return c.json({ success: true })
  })

  return app
}
