// Hono cookie adapter
// Values go out unescaped: hono/cookie's setCookie percent-encodes them, and the
// session cookie has to stay plain padded base64 on the wire.

import type { Context } from 'hono'
import { getCookie } from 'hono/cookie'
import type { CookieJar, SessionCookieOptions } from '../interfaces/cookies'

// RFC 6265 cookie-octet
const COOKIE_VALUE_PATTERN = /^[!#-+\--:<-[\]-~]*$/

export function serializeCookie(name: string, value: string, options: SessionCookieOptions): string {
  if (!COOKIE_VALUE_PATTERN.test(value)) {
    throw new Error(`Cookie value for "${name}" contains characters that need escaping`)
  }

  let cookie = `${name}=${value}; Max-Age=${options.maxAge}; Path=${options.path}; Expires=${options.expires.toUTCString()}`
  if (options.httpOnly) cookie += '; HttpOnly'
  if (options.secure) cookie += '; Secure'
  return cookie
}

export function honoCookies(c: Context): CookieJar {
  return {
    get: (name: string) => getCookie(c, name),
    set: (name: string, value: string, options: SessionCookieOptions) => {
      c.header('Set-Cookie', serializeCookie(name, value, options), { append: true })
    },
  }
}
