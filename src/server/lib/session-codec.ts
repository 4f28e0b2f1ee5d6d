// Fixed-layout binary form of a session:
//
//   [0, 8)    Unix seconds, big-endian signed
//   [8, 24)   sid
//   [24, 40)  uid
//   [40, 56)  realUid
//   [56, end) state, no length prefix
//
// The sealing envelope around the record is what delimits it, so state always
// runs to the end of the buffer.

import type { Session } from '../interfaces/session-store'
import { IDENTIFIER_LENGTH, type IdentifierScheme } from '../interfaces/identifiers'
import { uuidIdentifiers } from '../adapters/uuid-identifiers'

const TIME_LENGTH = 8
export const SESSION_HEADER_LENGTH = TIME_LENGTH + 3 * IDENTIFIER_LENGTH

// Date supports +/- 8.64e15 ms around the epoch
const MAX_SECONDS = 8_640_000_000_000n

const IDENTIFIER_FIELDS = ['sid', 'uid', 'realUid'] as const
export type IdentifierField = (typeof IDENTIFIER_FIELDS)[number]

export type CodecError =
  | { kind: 'too-short'; length: number }
  | { kind: 'invalid-identifier'; field: IdentifierField }
  | { kind: 'invalid-time' }

export type CodecResult<T> = { ok: true; value: T } | { ok: false; error: CodecError }

export function describeCodecError(error: CodecError): string {
  switch (error.kind) {
    case 'too-short':
      return `encoded session data is too short (${error.length} < ${SESSION_HEADER_LENGTH} bytes)`
    case 'invalid-identifier':
      return `session field ${error.field} is not a valid identifier`
    case 'invalid-time':
      return 'session time is out of range'
  }
}

export function encodeSession(
  session: Session,
  ids: IdentifierScheme = uuidIdentifiers
): CodecResult<Uint8Array> {
  const millis = session.time.getTime()
  if (Number.isNaN(millis)) {
    return { ok: false, error: { kind: 'invalid-time' } }
  }

  const buf = new Uint8Array(SESSION_HEADER_LENGTH + session.state.length)
  new DataView(buf.buffer).setBigInt64(0, BigInt(Math.floor(millis / 1000)))

  let offset = TIME_LENGTH
  for (const field of IDENTIFIER_FIELDS) {
    const bytes = ids.toBytes(session[field])
    if (!bytes || bytes.length !== IDENTIFIER_LENGTH) {
      return { ok: false, error: { kind: 'invalid-identifier', field } }
    }
    buf.set(bytes, offset)
    offset += IDENTIFIER_LENGTH
  }

  buf.set(session.state, offset)
  return { ok: true, value: buf }
}

export function decodeSession(
  data: Uint8Array,
  ids: IdentifierScheme = uuidIdentifiers
): CodecResult<Session> {
  if (data.length < SESSION_HEADER_LENGTH) {
    return { ok: false, error: { kind: 'too-short', length: data.length } }
  }

  const seconds = new DataView(data.buffer, data.byteOffset, data.byteLength).getBigInt64(0)
  if (seconds > MAX_SECONDS || seconds < -MAX_SECONDS) {
    return { ok: false, error: { kind: 'invalid-time' } }
  }

  const parsed: Record<IdentifierField, string> = { sid: '', uid: '', realUid: '' }
  let offset = TIME_LENGTH
  for (const field of IDENTIFIER_FIELDS) {
    const id = ids.parse(data.subarray(offset, offset + IDENTIFIER_LENGTH))
    if (id === null) {
      return { ok: false, error: { kind: 'invalid-identifier', field } }
    }
    parsed[field] = id
    offset += IDENTIFIER_LENGTH
  }

  return {
    ok: true,
    value: {
      valid: true,
      time: new Date(Number(seconds) * 1000),
      sid: parsed.sid,
      uid: parsed.uid,
      realUid: parsed.realUid,
      state: data.slice(SESSION_HEADER_LENGTH),
    },
  }
}
