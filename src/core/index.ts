/**
 * Core module - job/task lifecycle, result upload and the agent control loop
 */

export * from './types'
export * from './config'
export * from './errors'
export * from './polling-client'
export * from './task-scheduler'
export * from './uploader'
export * from './control-loop'
