export * from './lib/charset'
export * from './lib/json-value'
export * from './lib/json-format'
export * from './lib/parser-error'
export * from './lib/parser-options'
export * from './lib/parser-state'
export * from './lib/parser'
export * from './lib/memory-parser'
export * from './lib/file-parser'
export * from './lib/parse'
