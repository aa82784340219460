import { EventEmitter } from 'node:events'
import * as path from 'node:path'
import { setTimeout as sleep } from 'node:timers/promises'
import { BrowserRegistry } from '../browser/browser-registry'
import { BrowserRegistryError } from '../browser/errors'
import type { BrowserController } from '../browser/types'
import { logger } from '../logger'
import { describeError, TaskTimeoutError } from './errors'
import { PollingClient, createPollingClient } from './polling-client'
import { TaskScheduler, createTaskScheduler } from './task-scheduler'
import type { AgentConfig, Job, ScriptCommand, Task } from './types'
import { Uploader, createUploader } from './uploader'
import { withTimeout } from './utils/with-timeout'

export interface ControlLoopDependencies {
  pollingClient: PollingClient
  scheduler: TaskScheduler
  uploader: Uploader
  browsers: BrowserRegistry
  pollInterval?: number // ms, defaults to 15 seconds
  /** Called on a second exit request while one is already pending */
  forceExit?: () => void
}

/**
 * Polls for work and runs each job's tasks one at a time: resolve a browser, execute
 * the task's script, upload the result. A failure in one iteration is logged and
 * the loop carries on; only an exit request stops it.
 *
 * Emits `jobStart` and `jobComplete` with the job, `taskStart` and `taskComplete`
 * with the task, and `iterationError` with whatever an iteration threw.
 */
export class ControlLoop extends EventEmitter {
  private pollingClient: PollingClient
  private scheduler: TaskScheduler
  private uploader: Uploader
  private browsers: BrowserRegistry
  private pollInterval: number
  private forceExit: () => void
  private exitPending = false
  private busy = false
  private sleepAbort?: AbortController

  constructor(deps: ControlLoopDependencies) {
    super()
    this.pollingClient = deps.pollingClient
    this.scheduler = deps.scheduler
    this.uploader = deps.uploader
    this.browsers = deps.browsers
    this.pollInterval = deps.pollInterval ?? 15000
    this.forceExit = deps.forceExit ?? (() => process.exit(1))
  }

  isExitPending(): boolean {
    return this.exitPending
  }

  /**
   * Asks the loop to stop after the job in progress. A second request while one
   * is pending terminates immediately.
   */
  requestExit(): void {
    if (this.exitPending) {
      logger.critical('Exiting immediately')
      this.forceExit()
      return
    }

    this.exitPending = true
    if (this.busy) {
      logger.critical('Will exit after test completes.  Hit Ctrl+C again to exit immediately')
    } else {
      logger.critical('Exiting...')
    }
    this.sleepAbort?.abort()
  }

  async run(): Promise<void> {
    await this.scheduler.resetWorkspace()

    while (!this.exitPending) {
      try {
        if (!(await this.runIteration())) {
          await this.idle()
        }
      } catch (error) {
        const iterationError = error instanceof Error ? error : new Error(String(error))
        logger.critical('Unhandled exception:', iterationError)
        this.emit('iterationError', iterationError)
        await this.idle()
      }
    }
  }

  /**
   * One poll: fetch a job and run all of its tasks. Resolves to false when there was no work.
   */
  async runIteration(): Promise<boolean> {
    if (!this.browsers.isReady()) {
      return false
    }

    const job = await this.pollingClient.fetchJob()
    if (!job) {
      return false
    }

    this.busy = true
    try {
      logger.info(`Running test ${job.id} (${job.runs} run(s) in ${job.browser})`)
      this.emit('jobStart', job)

      let task = await this.scheduler.nextTask(job)
      while (task) {
        await this.runTask(job, task)
        task = await this.scheduler.nextTask(job)
      }

      this.emit('jobComplete', job)
    } finally {
      this.busy = false
    }

    return true
  }

  private async runTask(job: Job, task: Task): Promise<void> {
    this.emit('taskStart', task)

    const controller = this.acquireController(job, task)
    if (controller) {
      await this.executeTask(job, task, controller)
    }

    // An error is part of the result, so every task is uploaded
    await this.uploader.upload(task)
    this.emit('taskComplete', task)
  }

  private acquireController(job: Job, task: Task): BrowserController | undefined {
    try {
      return this.browsers.getBrowser(job.browser)
    } catch (error) {
      if (error instanceof BrowserRegistryError) {
        logger.critical(error.message)
        task.error = error.message
        return undefined
      }
      throw error
    }
  }

  private async executeTask(job: Job, task: Task, controller: BrowserController): Promise<void> {
    try {
      await controller.prepare(task)
      await controller.launch(task)
      await this.runScript(job, task, controller)
    } catch (error) {
      task.error = describeError(error)
      // Abandoned tasks are never resumed
      task.script.length = 0
      logger.critical(`Test ${task.jobId} run ${task.run} failed: ${task.error}`)
    } finally {
      await this.stopController(controller)
    }
  }

  private async runScript(job: Job, task: Task, controller: BrowserController): Promise<void> {
    const deadline = Date.now() + task.timeLimit * 1000

    let command = task.script.shift()
    while (command) {
      const remaining = deadline - Date.now()
      if (remaining <= 0) {
        throw new TaskTimeoutError(task)
      }

      await withTimeout(this.runCommand(job, task, controller, command), remaining, () => new TaskTimeoutError(task))
      command = task.script.shift()
    }
  }

  private async runCommand(job: Job, task: Task, controller: BrowserController, command: ScriptCommand): Promise<void> {
    if (command.record) {
      await controller.startRecording(task)
    }

    switch (command.kind) {
      case 'navigate':
        await controller.navigate(command.target)
        break
      default: {
        const unknownCommand: never = command.kind
        throw new Error(`Unsupported script command: ${String(unknownCommand)}`)
      }
    }

    if (command.record) {
      await controller.waitForPageLoad()
      await controller.stopRecording(task)

      if (job.captureFullSizeScreenshots) {
        await controller.grabScreenshot(path.join(task.workingDir, `${task.prefix}screen.png`), { format: 'png' })
      } else {
        await controller.grabScreenshot(path.join(task.workingDir, `${task.prefix}screen.jpg`), {
          format: 'jpeg',
          quality: job.imageQuality,
        })
      }
    }
  }

  private async stopController(controller: BrowserController): Promise<void> {
    try {
      await controller.stop()
    } catch (error) {
      logger.error(`Failed to stop ${controller.name}:`, error)
    }
  }

  // Waits out the poll interval; never rejects, an exit request ends the wait early
  private async idle(): Promise<void> {
    if (this.exitPending) return

    const abort = new AbortController()
    this.sleepAbort = abort
    try {
      await sleep(this.pollInterval, undefined, { signal: abort.signal })
    } catch (error) {
      if (!abort.signal.aborted) {
        logger.error('Poll interval wait failed:', error)
      }
    } finally {
      this.sleepAbort = undefined
    }
  }
}

export interface CreateControlLoopOptions {
  forceExit?: () => void
}

/**
 * Wires the agent's components from a loaded configuration
 */
export function createControlLoop(config: AgentConfig, options: CreateControlLoopOptions = {}): ControlLoop {
  const agentDir = path.join(config.workDir, config.name)

  return new ControlLoop({
    pollingClient: createPollingClient({
      server: config.server,
      location: config.location,
      name: config.name,
      key: config.key,
      timeout: config.pollTimeout,
    }),
    scheduler: createTaskScheduler({ agentDir }),
    uploader: createUploader({
      server: config.server,
      location: config.location,
      key: config.key,
      agentDir,
      timeout: config.uploadTimeout,
    }),
    browsers: new BrowserRegistry(config.browsers, {
      headless: config.headless,
      startTimeout: config.startBrowserTimeout,
    }),
    pollInterval: config.pollInterval,
    forceExit: options.forceExit,
  })
}
