import type { BrowserConfig } from '../core/types'
import { BrowserRegistryError } from './errors'
import { createChromeController } from './chrome-controller'
import type { BrowserController, ControllerFactory, ControllerOptions } from './types'

export interface BrowserRegistryOptions extends Partial<ControllerOptions> {
  createController?: ControllerFactory
}

/**
 * Maps a job's browser selector to launch parameters and hands out
 * a new controller for every task.
 */
export class BrowserRegistry {
  private browsers = new Map<string, BrowserConfig>()
  private controllerOptions: ControllerOptions
  private createController: ControllerFactory

  constructor(browsers: Record<string, BrowserConfig> = {}, options: BrowserRegistryOptions = {}) {
    Object.entries(browsers).forEach(([selector, config]) => {
      this.browsers.set(selector, config)
    })

    this.controllerOptions = {
      headless: options.headless ?? false,
      startTimeout: options.startTimeout ?? 30000,
      logLevel: options.logLevel ?? 'error',
    }
    this.createController = options.createController ?? createChromeController
  }

  // The agent only asks for work when it can run at least one browser
  isReady(): boolean {
    return this.browsers.size > 0
  }

  hasBrowser(selector: string): boolean {
    return this.browsers.has(selector)
  }

  listBrowsers(): string[] {
    return Array.from(this.browsers.keys())
  }

  getBrowser(selector: string): BrowserController {
    const config = this.browsers.get(selector)
    if (!config) {
      throw new BrowserRegistryError(`Invalid browser - ${selector}`, selector)
    }
    return this.createController(selector, config, this.controllerOptions)
  }
}
