import { launch, type LaunchedChrome } from 'chrome-launcher'
import CDP from 'chrome-remote-interface'
import { mkdir, writeFile } from 'node:fs/promises'
import * as path from 'node:path'

import { logger } from '../logger'
import { VIDEO_DIRNAME, type BrowserConfig, type Task } from '../core/types'
import { withTimeout } from '../core/utils/with-timeout'
import { DevToolsConnectError, NavigationError } from './errors'
import type { BrowserController, ControllerOptions, ScreenshotOptions } from './types'

const DEFAULT_CHROME_FLAGS = ['--no-sandbox', '--disable-dev-shm-usage', '--no-first-run', '--no-default-browser-check']
const VIDEO_FRAME_QUALITY = 75

interface RecordedEvent {
  method: string
  params: object
  timestamp: number
}

/**
 * Browser controller for Chrome: launches it with the task's profile and
 * drives it over the DevTools protocol.
 */
export class ChromeController implements BrowserController {
  readonly name: string
  private config: BrowserConfig
  private options: ControllerOptions
  private chrome?: LaunchedChrome
  private client?: CDP.Client
  private events: RecordedEvent[] = []
  private subscriptions: Array<() => unknown> = []
  private pendingWrites: Promise<void>[] = []
  private pageLoad?: Promise<unknown>
  private recordingStart = 0
  private lastFrameMs = -1

  constructor(name: string, config: BrowserConfig, options: ControllerOptions) {
    this.name = name
    this.config = config
    this.options = options
  }

  async prepare(task: Task): Promise<void> {
    await mkdir(task.workingDir, { recursive: true })
    await mkdir(task.profileDir, { recursive: true })
    if (task.captureVideo) {
      await mkdir(path.join(task.workingDir, VIDEO_DIRNAME), { recursive: true })
    }
  }

  async launch(task: Task): Promise<void> {
    const chromeFlags = [...DEFAULT_CHROME_FLAGS, `--window-size=${task.width},${task.height}`, ...this.config.flags]
    if (this.options.headless) {
      chromeFlags.push('--headless')
    }

    logger.debug(`Launching ${this.name} on port ${task.port} with profile ${task.profileDir}`)

    this.chrome = await launch({
      chromePath: this.config.executablePath,
      chromeFlags,
      port: task.port,
      userDataDir: task.profileDir,
      logLevel: this.options.logLevel ?? 'error',
      // the agent handles Ctrl+C itself so in-flight tasks can finish
      handleSIGINT: false,
    })

    const port = this.chrome.port
    this.client = await withTimeout(
      CDP({ port }),
      this.options.startTimeout,
      () => new DevToolsConnectError(port, this.options.startTimeout),
    )
    logger.debug('Devtools connected')

    await Promise.all([this.client.Page.enable(), this.client.Network.enable({})])
  }

  async startRecording(task: Task): Promise<void> {
    const client = this.requireClient()

    this.events = []
    this.recordingStart = Date.now()
    this.lastFrameMs = -1
    this.pageLoad = client.Page.loadEventFired()

    this.subscriptions.push(
      client.Network.requestWillBeSent((params) => this.recordEvent('Network.requestWillBeSent', params)),
      client.Network.responseReceived((params) => this.recordEvent('Network.responseReceived', params)),
      client.Network.loadingFinished((params) => this.recordEvent('Network.loadingFinished', params)),
      client.Network.loadingFailed((params) => this.recordEvent('Network.loadingFailed', params)),
      client.Page.loadEventFired((params) => this.recordEvent('Page.loadEventFired', params)),
    )

    if (task.captureVideo) {
      const videoDir = path.join(task.workingDir, VIDEO_DIRNAME)
      this.subscriptions.push(
        client.Page.screencastFrame((frame) => {
          this.pendingWrites.push(this.writeFrame(client, videoDir, frame.data, frame.sessionId))
        }),
      )
      await client.Page.startScreencast({ format: 'jpeg', quality: VIDEO_FRAME_QUALITY, everyNthFrame: 1 })
    }
  }

  async navigate(url: string): Promise<void> {
    const client = this.requireClient()
    logger.info(`Navigating to ${url}`)

    const { errorText } = await client.Page.navigate({ url })
    if (errorText) {
      throw new NavigationError(url, errorText)
    }
  }

  async waitForPageLoad(): Promise<void> {
    const client = this.requireClient()
    const pageLoad = this.pageLoad ?? client.Page.loadEventFired()
    this.pageLoad = undefined

    await pageLoad
    logger.debug('Page load event received')
  }

  async stopRecording(task: Task): Promise<void> {
    const client = this.requireClient()

    if (task.captureVideo) {
      await client.Page.stopScreencast()
    }
    this.unsubscribe()

    await Promise.all(this.pendingWrites)
    this.pendingWrites = []

    const eventsFile = path.join(task.workingDir, `${task.prefix}devtools.json`)
    await writeFile(eventsFile, JSON.stringify(this.events))
    logger.debug(`Wrote ${this.events.length} devtools events to ${eventsFile}`)
    this.events = []
  }

  async grabScreenshot(filePath: string, options: ScreenshotOptions): Promise<void> {
    const client = this.requireClient()

    const { data } = await client.Page.captureScreenshot(
      options.format === 'png' ? { format: 'png' } : { format: 'jpeg', quality: options.quality },
    )
    await writeFile(filePath, Buffer.from(data, 'base64'))
    logger.debug(`Saved screenshot ${filePath}`)
  }

  async stop(): Promise<void> {
    const client = this.client
    const chrome = this.chrome
    this.client = undefined
    this.chrome = undefined
    this.pageLoad = undefined
    this.unsubscribe()

    if (client) {
      try {
        await client.close()
      } catch (error) {
        logger.warn('Failed to close dev tools connection:', error)
      }
    }

    if (chrome) {
      try {
        await chrome.kill()
        logger.debug(`Stopped ${this.name} (pid: ${chrome.pid})`)
      } catch (error) {
        logger.warn(`Failed to kill Chrome instance: ${error}`)
      }
    }
  }

  private recordEvent(method: string, params: object): void {
    this.events.push({ method, params, timestamp: Date.now() })
  }

  private async writeFrame(client: CDP.Client, videoDir: string, data: string, sessionId: number): Promise<void> {
    // Frames landing in the same millisecond are shifted forward so none is overwritten
    const elapsed = Math.max(Date.now() - this.recordingStart, this.lastFrameMs + 1)
    this.lastFrameMs = elapsed
    const framePath = path.join(videoDir, `ms_${String(elapsed).padStart(6, '0')}.jpg`)

    try {
      await writeFile(framePath, Buffer.from(data, 'base64'))
      await client.Page.screencastFrameAck({ sessionId })
    } catch (error) {
      logger.warn(`Failed to save video frame ${framePath}:`, error)
    }
  }

  private unsubscribe(): void {
    this.subscriptions.forEach((unsubscribe) => unsubscribe())
    this.subscriptions = []
  }

  private requireClient(): CDP.Client {
    if (!this.client) {
      throw new Error(`${this.name} is not running`)
    }
    return this.client
  }
}

export function createChromeController(name: string, config: BrowserConfig, options: ControllerOptions): BrowserController {
  return new ChromeController(name, config, options)
}
