// Main exports
export { createApp, toSessionView, type AppContext, type AppOptions, type SessionView } from './app'
export { loadConfig, parseDuration, type ServerConfig, type ConfigResult } from './config'
export { sessionMiddleware, type SessionEnv } from './session-middleware'
export {
  encodeSession,
  decodeSession,
  describeCodecError,
  SESSION_HEADER_LENGTH,
  type CodecError,
  type CodecResult,
  type IdentifierField,
} from './lib/session-codec'
export { encodeBase64, decodeBase64 } from './lib/base64'
export * from './interfaces'
export * from './adapters'
