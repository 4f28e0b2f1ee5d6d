// UUID identifier scheme (random v4 generation, any 16 bytes accepted on parse)

import { randomUUID } from 'node:crypto'
import { IDENTIFIER_LENGTH, type IdentifierScheme } from '../interfaces/identifiers'

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

export const NIL_ID = '00000000-0000-0000-0000-000000000000'

export class UuidIdentifiers implements IdentifierScheme {
  readonly nil = NIL_ID

  generate(): string {
    return randomUUID()
  }

  parse(bytes: Uint8Array): string | null {
    if (bytes.length !== IDENTIFIER_LENGTH) return null

    const hex = bytesToHex(bytes)
    return [
      hex.slice(0, 8),
      hex.slice(8, 12),
      hex.slice(12, 16),
      hex.slice(16, 20),
      hex.slice(20),
    ].join('-')
  }

  toBytes(id: string): Uint8Array | null {
    if (!UUID_PATTERN.test(id)) return null
    return hexToBytes(id.replace(/-/g, ''))
  }

  isValid(id: string): boolean {
    return UUID_PATTERN.test(id)
  }
}

export const uuidIdentifiers = new UuidIdentifiers()

function hexToBytes(hex: string): Uint8Array {
  const bytes = new Uint8Array(hex.length / 2)
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.substring(i * 2, i * 2 + 2), 16)
  }
  return bytes
}

function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('')
}
