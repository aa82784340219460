import type { BrowserConfig, Task } from '../core/types'

export interface ScreenshotOptions {
  format: 'png' | 'jpeg'
  /** JPEG quality, 1-100. Ignored for PNG */
  quality?: number
}

/**
 * Drives one browser for one task. A fresh controller is handed out per task;
 * `stop()` is always called once execution ends, whether it succeeded or not.
 */
export interface BrowserController {
  readonly name: string
  prepare(task: Task): Promise<void>
  launch(task: Task): Promise<void>
  startRecording(task: Task): Promise<void>
  navigate(url: string): Promise<void>
  waitForPageLoad(): Promise<void>
  stopRecording(task: Task): Promise<void>
  grabScreenshot(filePath: string, options: ScreenshotOptions): Promise<void>
  stop(): Promise<void>
}

export interface ControllerOptions {
  headless: boolean
  startTimeout: number // ms
  logLevel?: 'silent' | 'error' | 'info' | 'verbose'
}

export type ControllerFactory = (name: string, config: BrowserConfig, options: ControllerOptions) => BrowserController
