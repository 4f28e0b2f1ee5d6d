// Cookie access abstraction
// Implement this for each HTTP framework the store is used with

export interface SessionCookieOptions {
  path: string
  httpOnly: boolean
  secure: boolean
  expires: Date
  maxAge: number
}

export interface CookieJar {
  get(name: string): string | undefined
  set(name: string, value: string, options: SessionCookieOptions): void
}

// RFC 6265 cookie-name token
export const COOKIE_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/
