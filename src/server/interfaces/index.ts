export * from './session-store'
export * from './cookies'
export * from './crypto'
export * from './identifiers'
