// Session store
export {
  CookieSessionStore,
  SessionConfigError,
  SessionSaveError,
  deriveKey,
  type CookieSessionStoreOptions,
} from './cookie-session-store'

// Crypto (NaCl secretbox via tweetnacl)
export { SecretboxCipher, secureRandom } from './secretbox-cipher'
export { UuidIdentifiers, uuidIdentifiers, NIL_ID } from './uuid-identifiers'

// Cookie jars
export { honoCookies } from './hono-cookies'
export { MemoryCookieJar, type WrittenCookie } from './memory-cookie-jar'
