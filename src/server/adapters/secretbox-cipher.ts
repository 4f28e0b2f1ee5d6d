// NaCl secretbox adapter (XSalsa20-Poly1305, 24-byte nonce, 32-byte key)

import nacl from 'tweetnacl'
import type { AeadCipher, RandomSource } from '../interfaces/crypto'

export class SecretboxCipher implements AeadCipher {
  readonly keyLength = nacl.secretbox.keyLength
  readonly nonceLength = nacl.secretbox.nonceLength
  readonly overhead = nacl.secretbox.overheadLength

  seal(plaintext: Uint8Array, nonce: Uint8Array, key: Uint8Array): Uint8Array {
    return nacl.secretbox(plaintext, nonce, key)
  }

  open(sealed: Uint8Array, nonce: Uint8Array, key: Uint8Array): Uint8Array | null {
    // tweetnacl throws on wrong key/nonce sizes; treat those as failed authentication too
    if (nonce.length !== this.nonceLength || key.length !== this.keyLength) return null
    return nacl.secretbox.open(sealed, nonce, key) || null
  }
}

// Throws "no PRNG" when the platform has no secure generator
export const secureRandom: RandomSource = (length) => nacl.randomBytes(length)
