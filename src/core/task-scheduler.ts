import { mkdir, rm } from 'node:fs/promises'
import * as path from 'node:path'
import { logger } from '../logger'
import type { Job, JobState, ScriptCommand, Task } from './types'

export const DEFAULT_TIME_LIMIT = 120 // seconds
export const DEFAULT_VIEWPORT = { width: 1024, height: 768 }
export const DEFAULT_DEBUG_PORT = 9222

export interface TaskSchedulerConfig {
  /** Agent directory: root of all per-job state, exclusively owned by this agent */
  agentDir: string
}

/**
 * Turns a job into its sequence of tasks: the first view of each run,
 * followed by its repeat view unless the job asks for first views only.
 *
 *   Fresh -> FirstView(1) -> RepeatView(1) -> FirstView(2) -> ... -> Complete
 */
export class TaskScheduler {
  readonly agentDir: string

  constructor(config: TaskSchedulerConfig) {
    this.agentDir = config.agentDir
  }

  /**
   * Wipes state left behind by a previous, unclean exit of this agent
   */
  async resetWorkspace(): Promise<void> {
    await rm(this.agentDir, { recursive: true, force: true })
    logger.debug(`Reset agent directory ${this.agentDir}`)
  }

  /**
   * Advances the job's state and materializes the next task, or returns null once
   * the job is exhausted. Returning null also discards all per-job working state.
   */
  async nextTask(job: Job): Promise<Task | null> {
    if (job.state?.done) {
      await this.discard()
      return null
    }

    const state = advance(job)
    job.state = state

    if (state.run > job.runs) {
      await this.discard()
      return null
    }

    const cached = state.repeatView
    const done = state.run === job.runs && (state.repeatView || job.fvonly)
    if (done) {
      state.done = true
    }

    const workingDir = path.join(this.agentDir, `${job.id}.${state.run}.${cached ? 1 : 0}`)
    const profileDir = path.join(this.agentDir, `browser.${job.id}.${state.run}`)

    // A stale directory from an earlier attempt at the same view is replaced
    await rm(workingDir, { recursive: true, force: true })
    await mkdir(workingDir, { recursive: true })
    await mkdir(profileDir, { recursive: true })

    const task: Task = {
      jobId: job.id,
      run: state.run,
      cached,
      done,
      workingDir,
      profileDir,
      timeLimit: job.timeLimit ?? DEFAULT_TIME_LIMIT,
      width: DEFAULT_VIEWPORT.width,
      height: DEFAULT_VIEWPORT.height,
      port: DEFAULT_DEBUG_PORT,
      prefix: `${state.run}_${cached ? 'Cached_' : ''}`,
      captureVideo: job.captureVideo,
      script: buildScript(job),
    }

    logger.debug(`Scheduled test ${job.id} run ${task.run}${cached ? ' (repeat view)' : ''}${done ? ', last task' : ''}`)

    return task
  }

  /**
   * Removes the agent directory. Failures are logged and otherwise ignored.
   */
  async discard(): Promise<void> {
    try {
      await rm(this.agentDir, { recursive: true, force: true })
    } catch (error) {
      logger.debug(`Failed to remove ${this.agentDir}:`, error)
    }
  }
}

function advance(job: Job): JobState {
  const state = job.state

  if (!state) {
    return { run: 1, repeatView: false, done: false }
  }

  if (!state.repeatView && !job.fvonly) {
    return { ...state, repeatView: true }
  }

  return { ...state, run: state.run + 1, repeatView: false }
}

function buildScript(job: Job): ScriptCommand[] {
  if (job.script) {
    return job.script.map((command) => ({ ...command }))
  }

  if (job.url) {
    return [{ kind: 'navigate', target: job.url, record: true }]
  }

  return []
}

export function createTaskScheduler(config: TaskSchedulerConfig): TaskScheduler {
  return new TaskScheduler(config)
}
