// Session store abstraction interface
// The cookie itself carries the session; there is no server-side record.

import type { CookieJar } from './cookies'

export interface Session {
  // True only when decoded from a verified, unexpired cookie
  valid: boolean
  time: Date
  sid: string
  uid: string
  // Real identity while uid is an impersonation target
  realUid: string
  state: Uint8Array
}

export type RejectReason =
  | 'missing'
  | 'malformed-encoding'
  | 'truncated'
  | 'unauthenticated'
  | 'malformed-record'
  | 'expired'

export type SessionLookup =
  | { status: 'valid'; session: Session }
  | { status: 'anonymous'; reason: RejectReason; session: Session }

export interface SessionStore {
  readonly name: string
  readonly ttl: number

  load(cookies: CookieJar): SessionLookup
  get(cookies: CookieJar): Session
  save(cookies: CookieJar, session: Session): void
  clear(cookies: CookieJar): void
}

// Default TTL values
export const SESSION_TTL = 7 * 24 * 60 * 60 // 7 days in seconds
export const MAX_SESSION_TTL = 400 * 24 * 60 * 60 // browsers cap Max-Age at 400 days
