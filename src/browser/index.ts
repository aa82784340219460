/**
 * Browser module - browser registry and the Chrome DevTools controller
 */

export * from './types'
export * from './errors'
export * from './browser-registry'
export * from './chrome-controller'
