import { describe, it, expect } from 'vitest'
import { MemoryCookieJar } from './memory-cookie-jar'
import type { SessionCookieOptions } from '../interfaces/cookies'

const options: SessionCookieOptions = {
  path: '/',
  httpOnly: true,
  secure: false,
  expires: new Date('2026-01-01T01:00:00.000Z'),
  maxAge: 3600,
}

describe('MemoryCookieJar', () => {
  it('reads incoming cookies', () => {
    const jar = new MemoryCookieJar({ session: 'abc' })

    expect(jar.get('session')).toBe('abc')
    expect(jar.get('other')).toBeUndefined()
  })

  it('records writes without changing incoming cookies', () => {
    const jar = new MemoryCookieJar({ session: 'abc' })

    jar.set('session', 'def', options)

    expect(jar.get('session')).toBe('abc')
    expect(jar.written).toEqual([{ name: 'session', value: 'def', options }])
  })

  it('returns the last write per name', () => {
    const jar = new MemoryCookieJar()

    jar.set('session', 'first', options)
    jar.set('theme', 'dark', options)
    jar.set('session', 'second', options)

    expect(jar.lastWritten('session')?.value).toBe('second')
    expect(jar.lastWritten('missing')).toBeUndefined()
  })

  it('carries writes into the next request', () => {
    const jar = new MemoryCookieJar({ theme: 'light' })

    jar.set('session', 'abc', options)
    const next = jar.next()

    expect(next.get('session')).toBe('abc')
    expect(next.get('theme')).toBe('light')
  })

  it('drops deleted cookies from the next request', () => {
    const jar = new MemoryCookieJar({ session: 'abc' })

    jar.set('session', '', { ...options, expires: new Date(0), maxAge: 0 })

    expect(jar.next().get('session')).toBeUndefined()
  })

  it('keeps an empty value that has not expired', () => {
    const jar = new MemoryCookieJar({ session: 'abc' })

    jar.set('session', '', options)

    expect(jar.next().get('session')).toBe('')
  })

  it('drops a cookie overwritten with a negative max-age', () => {
    const jar = new MemoryCookieJar()

    jar.set('session', 'abc', options)
    jar.set('session', 'def', { ...options, maxAge: -1 })

    expect(jar.next().get('session')).toBeUndefined()
  })
})
