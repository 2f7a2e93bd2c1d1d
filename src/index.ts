export * from './memory/index.js'
export * from './config/index.js'
export * from './audit/index.js'
