// Sealed cookie session store
//
// Cookie value: base64(nonce || secretbox(record, nonce, sha256(secret)))
// Every failure on the way in (missing, bad base64, forged, malformed, expired)
// ends in the same fresh anonymous session.

import { createHash } from 'node:crypto'
import { COOKIE_NAME_PATTERN, type CookieJar, type SessionCookieOptions } from '../interfaces/cookies'
import type { AeadCipher, RandomSource } from '../interfaces/crypto'
import type { IdentifierScheme } from '../interfaces/identifiers'
import {
  MAX_SESSION_TTL,
  type RejectReason,
  type Session,
  type SessionLookup,
  type SessionStore,
} from '../interfaces/session-store'
import { decodeSession, describeCodecError, encodeSession } from '../lib/session-codec'
import { decodeBase64, encodeBase64 } from '../lib/base64'
import { SecretboxCipher, secureRandom } from './secretbox-cipher'
import { uuidIdentifiers } from './uuid-identifiers'

const KEY_LENGTH = 32

export interface CookieSessionStoreOptions {
  name: string
  secret: string
  // Seconds
  ttl: number
  httpOnly?: boolean
  secure?: boolean
  cipher?: AeadCipher
  ids?: IdentifierScheme
  random?: RandomSource
}

export class SessionConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SessionConfigError'
  }
}

export class SessionSaveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SessionSaveError'
  }
}

export function deriveKey(secret: string): Uint8Array {
  return new Uint8Array(createHash('sha256').update(secret, 'utf8').digest())
}

export class CookieSessionStore implements SessionStore {
  readonly name: string
  readonly ttl: number
  readonly httpOnly: boolean
  readonly secure: boolean

  private readonly key: Uint8Array
  private readonly cipher: AeadCipher
  private readonly ids: IdentifierScheme
  private readonly random: RandomSource

  constructor(options: CookieSessionStoreOptions) {
    if (!COOKIE_NAME_PATTERN.test(options.name)) {
      throw new SessionConfigError(`Invalid cookie name: "${options.name}"`)
    }
    if (!options.secret) {
      throw new SessionConfigError('Session secret is required')
    }
    if (!Number.isInteger(options.ttl) || options.ttl <= 0) {
      throw new SessionConfigError('Session TTL must be a positive whole number of seconds')
    }
    if (options.ttl > MAX_SESSION_TTL) {
      throw new SessionConfigError(`Session TTL cannot exceed ${MAX_SESSION_TTL} seconds (400 days)`)
    }

    this.cipher = options.cipher ?? new SecretboxCipher()
    if (this.cipher.keyLength !== KEY_LENGTH) {
      throw new SessionConfigError(`Cipher key length must be ${KEY_LENGTH} bytes, got ${this.cipher.keyLength}`)
    }

    this.name = options.name
    this.ttl = options.ttl
    this.httpOnly = options.httpOnly ?? false
    this.secure = options.secure ?? false
    this.key = deriveKey(options.secret)
    this.ids = options.ids ?? uuidIdentifiers
    this.random = options.random ?? secureRandom
  }

  load(cookies: CookieJar): SessionLookup {
    const value = cookies.get(this.name)
    if (value === undefined) return this.reject('missing')

    const sealed = decodeBase64(value)
    if (!sealed) return this.reject('malformed-encoding')

    const { nonceLength, overhead } = this.cipher
    if (sealed.length < nonceLength + overhead) return this.reject('truncated')

    const nonce = sealed.subarray(0, nonceLength)
    const plaintext = this.cipher.open(sealed.subarray(nonceLength), nonce, this.key)
    if (!plaintext) return this.reject('unauthenticated')

    const decoded = decodeSession(plaintext, this.ids)
    if (!decoded.ok) return this.reject('malformed-record')

    const session = decoded.value
    if (Date.now() - session.time.getTime() > this.ttl * 1000) {
      return this.reject('expired')
    }

    return { status: 'valid', session }
  }

  get(cookies: CookieJar): Session {
    return this.load(cookies).session
  }

  save(cookies: CookieJar, session: Session): void {
    let nonce: Uint8Array
    try {
      nonce = this.random(this.cipher.nonceLength)
    } catch (error) {
      throw new SessionSaveError('Could not get random nonce', { cause: error })
    }
    if (nonce.length !== this.cipher.nonceLength) {
      throw new SessionSaveError(`Random source returned ${nonce.length} bytes, expected ${this.cipher.nonceLength}`)
    }

    session.time = new Date()

    const encoded = encodeSession(session, this.ids)
    if (!encoded.ok) {
      throw new SessionSaveError(`Could not encode session: ${describeCodecError(encoded.error)}`)
    }

    const box = this.cipher.seal(encoded.value, nonce, this.key)

    // Combine nonce + box and encode as base64
    const combined = new Uint8Array(nonce.length + box.length)
    combined.set(nonce)
    combined.set(box, nonce.length)

    cookies.set(this.name, encodeBase64(combined), this.cookieOptions(
      new Date(session.time.getTime() + this.ttl * 1000),
      this.ttl
    ))
  }

  clear(cookies: CookieJar): void {
    // Max-Age=0 is how a negative max-age goes on the wire
    cookies.set(this.name, '', this.cookieOptions(new Date(0), 0))
  }

  // Fresh anonymous session; never carries anything over from the rejected cookie
  anonymous(): Session {
    return {
      valid: false,
      time: new Date(0),
      sid: this.ids.generate(),
      uid: this.ids.nil,
      realUid: this.ids.nil,
      state: new Uint8Array(0),
    }
  }

  private reject(reason: RejectReason): SessionLookup {
    return { status: 'anonymous', reason, session: this.anonymous() }
  }

  private cookieOptions(expires: Date, maxAge: number): SessionCookieOptions {
    return {
      path: '/',
      httpOnly: this.httpOnly,
      secure: this.secure,
      expires,
      maxAge,
    }
  }
}
