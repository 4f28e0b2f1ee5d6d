// In-memory cookie jar (for tests and tooling without an HTTP server)

import type { CookieJar, SessionCookieOptions } from '../interfaces/cookies'

export interface WrittenCookie {
  name: string
  value: string
  options: SessionCookieOptions
}

export class MemoryCookieJar implements CookieJar {
  private incoming: Map<string, string>
  readonly written: WrittenCookie[] = []

  constructor(cookies: Record<string, string> = {}) {
    this.incoming = new Map(Object.entries(cookies))
  }

  get(name: string): string | undefined {
    return this.incoming.get(name)
  }

  set(name: string, value: string, options: SessionCookieOptions): void {
    this.written.push({ name, value, options })
  }

  lastWritten(name: string): WrittenCookie | undefined {
    for (let i = this.written.length - 1; i >= 0; i--) {
      if (this.written[i].name === name) return this.written[i]
    }
    return undefined
  }

  // Cookies a browser would send on the next request after the writes so far
  next(): MemoryCookieJar {
    const cookies: Record<string, string> = Object.fromEntries(this.incoming)
    for (const { name, value, options } of this.written) {
      if (options.maxAge <= 0) {
        delete cookies[name]
      } else {
        cookies[name] = value
      }
    }
    return new MemoryCookieJar(cookies)
  }
}
