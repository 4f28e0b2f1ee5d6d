// Crypto abstraction interfaces
// One authenticated-encryption scheme per store; no negotiation on the wire.

export interface AeadCipher {
  readonly keyLength: number
  readonly nonceLength: number
  // Bytes the sealed form adds to the plaintext (authentication tag)
  readonly overhead: number
  seal(plaintext: Uint8Array, nonce: Uint8Array, key: Uint8Array): Uint8Array
  // Returns null when authentication fails
  open(sealed: Uint8Array, nonce: Uint8Array, key: Uint8Array): Uint8Array | null
}

// Must draw from a cryptographically secure source and throw when none is available
export type RandomSource = (length: number) => Uint8Array
