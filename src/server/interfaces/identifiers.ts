// 128-bit identifier scheme used for session, user and real-user ids

export interface IdentifierScheme {
  readonly nil: string
  generate(): string
  // null unless given exactly 16 bytes
  parse(bytes: Uint8Array): string | null
  toBytes(id: string): Uint8Array | null
  isValid(id: string): boolean
}

export const IDENTIFIER_LENGTH = 16
