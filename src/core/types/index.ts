export * from './config'
export * from './job'
export * from './task'
