import { describe, it, expect } from 'vitest'
import { loadConfig, parseDuration } from './config'

describe('parseDuration', () => {
  it('reads bare numbers as seconds', () => {
    expect(parseDuration('3600')).toBe(3600)
  })

  it('reads unit suffixes', () => {
    expect(parseDuration('90s')).toBe(90)
    expect(parseDuration('30m')).toBe(1800)
    expect(parseDuration('12h')).toBe(43200)
    expect(parseDuration('7d')).toBe(604800)
  })

  it('ignores surrounding whitespace', () => {
    expect(parseDuration(' 1h ')).toBe(3600)
  })

  it('rejects anything else', () => {
    expect(parseDuration('')).toBeNull()
    expect(parseDuration('1.5h')).toBeNull()
    expect(parseDuration('-5m')).toBeNull()
    expect(parseDuration('1w')).toBeNull()
    expect(parseDuration('h')).toBeNull()
  })
})

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({ SESSION_SECRET: 'test-secret' })).toEqual({
      ok: true,
      config: {
        cookieName: 'session',
        secret: 'test-secret',
        ttl: 604800,
        httpOnly: true,
        secure: true,
        port: 3000,
      },
    })
  })

  it('reads every variable', () => {
    const result = loadConfig({
      SESSION_SECRET: 'test-secret',
      SESSION_COOKIE_NAME: 'sid',
      SESSION_TTL: '2h',
      SESSION_HTTP_ONLY: 'false',
      SESSION_SECURE: '0',
      PORT: '8080',
    })

    expect(result).toEqual({
      ok: true,
      config: {
        cookieName: 'sid',
        secret: 'test-secret',
        ttl: 7200,
        httpOnly: false,
        secure: false,
        port: 8080,
      },
    })
  })

  it('requires a secret', () => {
    expect(loadConfig({})).toEqual({ ok: false, errors: ['SESSION_SECRET is required'] })
  })

  it('collects every problem', () => {
    const result = loadConfig({
      SESSION_COOKIE_NAME: 'my session',
      SESSION_TTL: 'forever',
      SESSION_HTTP_ONLY: 'yes',
      SESSION_SECURE: 'no',
      PORT: '70000',
    })

    expect(result).toEqual({
      ok: false,
      errors: [
        'SESSION_SECRET is required',
        'SESSION_COOKIE_NAME is not a valid cookie name: "my session"',
        'SESSION_TTL must be a positive duration like 3600, 30m, 12h or 7d: "forever"',
        'SESSION_HTTP_ONLY must be true or false',
        'SESSION_SECURE must be true or false',
        'PORT must be between 1 and 65535: "70000"',
      ],
    })
  })

  it('rejects a zero TTL', () => {
    const result = loadConfig({ SESSION_SECRET: 'test-secret', SESSION_TTL: '0' })

    expect(result.ok).toBe(false)
  })

  it('rejects a TTL above 400 days', () => {
    expect(loadConfig({ SESSION_SECRET: 'test-secret', SESSION_TTL: '401d' })).toEqual({
      ok: false,
      errors: ['SESSION_TTL cannot exceed 400 days'],
    })
    expect(loadConfig({ SESSION_SECRET: 'test-secret', SESSION_TTL: '400d' }).ok).toBe(true)
  })

  it('rejects a non-numeric port', () => {
    expect(loadConfig({ SESSION_SECRET: 'test-secret', PORT: 'http' })).toEqual({
      ok: false,
      errors: ['PORT must be between 1 and 65535: "http"'],
    })
  })
})
