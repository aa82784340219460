export * from './core'
export * from './browser'
export { logger, Logger, levelFromVerbosity, type LogLevel } from './logger'
