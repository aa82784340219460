import type { ScriptCommand } from './job'

// Task represents one browser execution unit: a single run and view of a job
export interface Task {
  jobId: string
  run: number
  /** True for the repeat view, which reuses the profile warmed by the first view */
  cached: boolean
  /** True for the last task of the job */
  done: boolean
  workingDir: string
  profileDir: string
  timeLimit: number // seconds
  width: number
  height: number
  port: number
  prefix: string
  captureVideo: boolean
  script: ScriptCommand[]
  error?: string
}

// Subdirectory of a task's working directory holding screencast frames
export const VIDEO_DIRNAME = 'video'
