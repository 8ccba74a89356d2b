export * from './blacklist.js'
export * from './config.js'
export * from './config-loader.js'
export * from './constants.js'
export * from './dispatcher.js'
export * from './environment.js'
export * from './errors.js'
export * from './extraction.js'
export * from './json.js'
export * from './logger.js'
export * from './masking.js'
export * from './observer.js'
export * from './patterns.js'
export * from './payload.js'
export * from './schema.js'
export * from './transports/certs.js'
export * from './transports/constrained.js'
export * from './transports/http1.js'
export * from './transports/native.js'
export * from './transports/types.js'
