// Environment configuration for the standalone server

import { MAX_SESSION_TTL, SESSION_TTL } from './interfaces/session-store'
import { COOKIE_NAME_PATTERN } from './interfaces/cookies'

export interface ServerConfig {
  cookieName: string
  secret: string
  ttl: number // seconds
  httpOnly: boolean
  secure: boolean
  port: number
}

export type ConfigResult =
  | { ok: true; config: ServerConfig }
  | { ok: false; errors: string[] }

export type Env = Record<string, string | undefined>

const DURATION_PATTERN = /^(\d+)([smhd]?)$/

const UNIT_SECONDS: Record<string, number> = {
  '': 1,
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 24 * 60 * 60,
}

// "3600", "90s", "30m", "12h", "7d" -> seconds; null when unparseable
export function parseDuration(value: string): number | null {
  const match = DURATION_PATTERN.exec(value.trim())
  if (!match) return null
  return parseInt(match[1], 10) * UNIT_SECONDS[match[2]]
}

function parseFlag(value: string | undefined, fallback: boolean): boolean | null {
  if (value === undefined || value === '') return fallback
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true
    case 'false':
    case '0':
      return false
    default:
      return null
  }
}

export function loadConfig(env: Env): ConfigResult {
  const errors: string[] = []

  const secret = env.SESSION_SECRET ?? ''
  if (!secret) {
    errors.push('SESSION_SECRET is required')
  }

  const cookieName = env.SESSION_COOKIE_NAME || 'session'
  if (!COOKIE_NAME_PATTERN.test(cookieName)) {
    errors.push(`SESSION_COOKIE_NAME is not a valid cookie name: "${cookieName}"`)
  }

  let ttl = SESSION_TTL
  if (env.SESSION_TTL) {
    const parsed = parseDuration(env.SESSION_TTL)
    if (parsed === null || parsed <= 0) {
      errors.push(`SESSION_TTL must be a positive duration like 3600, 30m, 12h or 7d: "${env.SESSION_TTL}"`)
    } else if (parsed > MAX_SESSION_TTL) {
      errors.push('SESSION_TTL cannot exceed 400 days')
    } else {
      ttl = parsed
    }
  }

  const httpOnly = parseFlag(env.SESSION_HTTP_ONLY, true)
  if (httpOnly === null) {
    errors.push('SESSION_HTTP_ONLY must be true or false')
  }

  const secure = parseFlag(env.SESSION_SECURE, true)
  if (secure === null) {
    errors.push('SESSION_SECURE must be true or false')
  }

  const port = parseInt(env.PORT || '3000', 10)
  if (!/^\d+$/.test(env.PORT || '3000') || port < 1 || port > 65535) {
    errors.push(`PORT must be between 1 and 65535: "${env.PORT}"`)
  }

  if (errors.length > 0 || httpOnly === null || secure === null) {
    return { ok: false, errors }
  }

  return {
    ok: true,
    config: { cookieName, secret, ttl, httpOnly, secure, port },
  }
}
