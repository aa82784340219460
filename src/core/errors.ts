import type { Task } from './types'

export class TaskTimeoutError extends Error {
  constructor(
    public readonly task: Pick<Task, 'jobId' | 'run' | 'cached' | 'timeLimit'>,
  ) {
    super(`Test run ${task.run}${task.cached ? ' (repeat view)' : ''} exceeded its time limit of ${task.timeLimit}s`)
    this.name = 'TaskTimeoutError'
  }
}

/** Describes any thrown value for a task's `error` field */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
