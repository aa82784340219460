import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals'
import { existsSync } from 'node:fs'
import { mkdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { randomUUID } from 'node:crypto'
import { TaskScheduler } from './task-scheduler'
import type { Job, Task } from './types'

jest.mock('../logger', () => ({
  logger: {
    critical: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
  },
}))

const createJob = (overrides: Partial<Job> = {}): Job => ({
  id: 'T1',
  browser: 'Chrome',
  runs: 2,
  fvonly: false,
  imageQuality: 30,
  captureFullSizeScreenshots: false,
  captureVideo: false,
  url: 'http://x',
  state: null,
  ...overrides,
})

async function drain(scheduler: TaskScheduler, job: Job): Promise<Task[]> {
  const tasks: Task[] = []
  let task = await scheduler.nextTask(job)
  while (task) {
    tasks.push(task)
    task = await scheduler.nextTask(job)
  }
  return tasks
}

describe('TaskScheduler', () => {
  let rootDir: string
  let agentDir: string
  let scheduler: TaskScheduler

  beforeEach(async () => {
    rootDir = join(tmpdir(), `task-scheduler-${randomUUID()}`)
    agentDir = join(rootDir, 'agent-1')
    scheduler = new TaskScheduler({ agentDir })
  })

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true })
  })

  describe('task sequence', () => {
    it('should pair first and repeat views for each run', async () => {
      const job = createJob()

      const sequence = []
      for (let call = 0; call < 4; call++) {
        const task = await scheduler.nextTask(job)
        expect(task).not.toBeNull()
        sequence.push({ run: task?.run, cached: task?.cached, done: task?.done })
      }

      expect(sequence).toEqual([
        { run: 1, cached: false, done: false },
        { run: 1, cached: true, done: false },
        { run: 2, cached: false, done: false },
        { run: 2, cached: true, done: true },
      ])
      expect(await scheduler.nextTask(job)).toBeNull()
    })

    it('should yield 2N tasks in run order when repeat views are enabled', async () => {
      const job = createJob({ runs: 3 })

      const tasks = await drain(scheduler, job)

      expect(tasks).toHaveLength(6)
      expect(tasks.map((task) => task.run)).toEqual([1, 1, 2, 2, 3, 3])
      expect(tasks.map((task) => task.cached)).toEqual([false, true, false, true, false, true])
      expect(tasks.map((task) => task.done)).toEqual([false, false, false, false, false, true])
    })

    it('should yield exactly N first views when fvonly is set', async () => {
      const job = createJob({ runs: 3, fvonly: true })

      const tasks = await drain(scheduler, job)

      expect(tasks.map((task) => task.run)).toEqual([1, 2, 3])
      expect(tasks.every((task) => !task.cached)).toBe(true)
      expect(tasks.map((task) => task.done)).toEqual([false, false, true])
    })

    it('should mark the job done together with its last task', async () => {
      const job = createJob({ runs: 1, fvonly: true })

      const task = await scheduler.nextTask(job)

      expect(task?.done).toBe(true)
      expect(job.state).toEqual({ run: 1, repeatView: false, done: true })
    })

    it('should return no task for a job that is already done', async () => {
      const job = createJob({ state: { run: 2, repeatView: true, done: true } })

      expect(await scheduler.nextTask(job)).toBeNull()
      expect(job.state).toEqual({ run: 2, repeatView: true, done: true })
    })

    it('should never decrease the run number', async () => {
      const job = createJob({ runs: 4 })
      const runs: number[] = []

      let task = await scheduler.nextTask(job)
      while (task) {
        runs.push(job.state?.run ?? 0)
        task = await scheduler.nextTask(job)
      }

      expect(runs).toEqual([...runs].sort((a, b) => a - b))
    })
  })

  describe('task fields', () => {
    it('should apply task defaults and file prefixes', async () => {
      const job = createJob()

      const first = await scheduler.nextTask(job)
      const repeat = await scheduler.nextTask(job)

      expect(first).toMatchObject({
        jobId: 'T1',
        timeLimit: 120,
        width: 1024,
        height: 768,
        port: 9222,
        prefix: '1_',
        captureVideo: false,
      })
      expect(repeat?.prefix).toBe('1_Cached_')
    })

    it('should use the job time limit when one is given', async () => {
      const task = await scheduler.nextTask(createJob({ timeLimit: 45 }))

      expect(task?.timeLimit).toBe(45)
    })

    it('should give each view its own working directory and share the run profile', async () => {
      const job = createJob()

      const first = await scheduler.nextTask(job)
      const repeat = await scheduler.nextTask(job)
      const secondRun = await scheduler.nextTask(job)

      expect(first?.workingDir).toBe(join(agentDir, 'T1.1.0'))
      expect(repeat?.workingDir).toBe(join(agentDir, 'T1.1.1'))
      expect(first?.profileDir).toBe(join(agentDir, 'browser.T1.1'))
      expect(repeat?.profileDir).toBe(first?.profileDir)
      expect(secondRun?.profileDir).toBe(join(agentDir, 'browser.T1.2'))
      expect(existsSync(join(agentDir, 'T1.1.0'))).toBe(true)
      expect(existsSync(join(agentDir, 'browser.T1.1'))).toBe(true)
    })

    it('should recreate a stale working directory', async () => {
      const staleDir = join(agentDir, 'T1.1.0')
      await mkdir(staleDir, { recursive: true })
      await writeFile(join(staleDir, 'leftover.txt'), 'old')

      const task = await scheduler.nextTask(createJob())

      expect(task?.workingDir).toBe(staleDir)
      expect(existsSync(staleDir)).toBe(true)
      expect(existsSync(join(staleDir, 'leftover.txt'))).toBe(false)
    })

    it('should keep an existing profile directory for the repeat view', async () => {
      const job = createJob()
      const first = await scheduler.nextTask(job)
      await writeFile(join(first?.profileDir ?? '', 'Cookies'), 'warm')

      const repeat = await scheduler.nextTask(job)

      expect(existsSync(join(repeat?.profileDir ?? '', 'Cookies'))).toBe(true)
    })
  })

  describe('scripts', () => {
    it('should synthesize a recorded navigation from the job url', async () => {
      const task = await scheduler.nextTask(createJob({ url: 'http://x' }))

      expect(task?.script).toEqual([{ kind: 'navigate', target: 'http://x', record: true }])
    })

    it('should copy a pre-built script instead of using the url', async () => {
      const script = [
        { kind: 'navigate' as const, target: 'http://warmup.test', record: false },
        { kind: 'navigate' as const, target: 'http://page.test', record: true },
      ]
      const job = createJob({ script })

      const first = await scheduler.nextTask(job)
      first?.script.shift()
      const repeat = await scheduler.nextTask(job)

      expect(repeat?.script).toEqual(script)
      expect(job.script).toHaveLength(2)
    })

    it('should produce an empty script when the job has neither script nor url', async () => {
      const task = await scheduler.nextTask(createJob({ url: undefined }))

      expect(task?.script).toEqual([])
    })
  })

  describe('workspace', () => {
    it('should remove the agent directory once the job is exhausted', async () => {
      const job = createJob({ runs: 1 })

      await drain(scheduler, job)

      expect(existsSync(agentDir)).toBe(false)
    })

    it('should wipe leftovers from a previous run on reset', async () => {
      await mkdir(join(agentDir, 'OLD.1.0'), { recursive: true })

      await scheduler.resetWorkspace()

      expect(existsSync(agentDir)).toBe(false)
    })
  })
})
