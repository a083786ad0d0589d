export * from './types.js'
export * from './platforms.js'
export * from './schema.js'
