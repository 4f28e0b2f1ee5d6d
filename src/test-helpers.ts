// Test helpers for cookie sessions

import type { Session } from './server/interfaces/session-store'
import { CookieSessionStore, type CookieSessionStoreOptions } from './server/adapters/cookie-session-store'
import { NIL_ID } from './server/adapters/uuid-identifiers'
import { decodeBase64, encodeBase64 } from './server/lib/base64'

export const TEST_SECRET = 'test-secret'

export const USER_ID = '6f1c2b3a-9d4e-4f5a-8b7c-1d2e3f4a5b6c'
export const ADMIN_ID = 'a0b1c2d3-e4f5-4a6b-8c7d-9e0f1a2b3c4d'

/**
 * Creates a session with fixed identifiers
 */
export function createMockSession(overrides: Partial<Session> = {}): Session {
  return {
    valid: false,
    time: new Date('2026-01-01T00:00:00.000Z'),
    sid: '11111111-2222-4333-8444-555555555555',
    uid: NIL_ID,
    realUid: NIL_ID,
    state: new Uint8Array(0),
    ...overrides,
  }
}

export function createTestStore(overrides: Partial<CookieSessionStoreOptions> = {}): CookieSessionStore {
  return new CookieSessionStore({
    name: 'session',
    secret: TEST_SECRET,
    ttl: 3600,
    ...overrides,
  })
}

/**
 * Flips one bit of the decoded cookie value and re-encodes it
 */
export function flipBit(cookieValue: string, bitIndex: number): string {
  const data = decodeBase64(cookieValue)
  if (!data) throw new Error(`Not a base64 cookie value: ${cookieValue}`)
  data[Math.floor(bitIndex / 8)] ^= 1 << (bitIndex % 8)
  return encodeBase64(data)
}

export function text(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes)
}

export function bytes(value: string): Uint8Array {
  return new TextEncoder().encode(value)
}
