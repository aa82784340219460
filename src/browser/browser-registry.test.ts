import { describe, it, expect, jest } from '@jest/globals'
import { BrowserRegistry } from './browser-registry'
import { BrowserRegistryError } from './errors'
import type { BrowserController, ControllerFactory } from './types'

jest.mock('chrome-launcher', () => ({
  launch: jest.fn(),
}))

const stubController = (name: string): BrowserController => ({
  name,
  prepare: async () => undefined,
  launch: async () => undefined,
  startRecording: async () => undefined,
  navigate: async () => undefined,
  waitForPageLoad: async () => undefined,
  stopRecording: async () => undefined,
  grabScreenshot: async () => undefined,
  stop: async () => undefined,
})

describe('BrowserRegistry', () => {
  it('should not be ready without configured browsers', () => {
    const registry = new BrowserRegistry()

    expect(registry.isReady()).toBe(false)
    expect(registry.listBrowsers()).toEqual([])
  })

  it('should list configured browser selectors', () => {
    const registry = new BrowserRegistry({ Chrome: { flags: [] }, Canary: { flags: [] } })

    expect(registry.isReady()).toBe(true)
    expect(registry.listBrowsers()).toEqual(['Chrome', 'Canary'])
    expect(registry.hasBrowser('Canary')).toBe(true)
    expect(registry.hasBrowser('Firefox')).toBe(false)
  })

  it('should create a controller with the selector config and controller options', () => {
    const createController = jest.fn<ControllerFactory>((name) => stubController(name))
    const registry = new BrowserRegistry(
      { Chrome: { executablePath: '/opt/chrome/chrome', flags: ['--lang=en'] } },
      { headless: true, startTimeout: 5000, createController },
    )

    const controller = registry.getBrowser('Chrome')

    expect(controller.name).toBe('Chrome')
    expect(createController).toHaveBeenCalledWith(
      'Chrome',
      { executablePath: '/opt/chrome/chrome', flags: ['--lang=en'] },
      { headless: true, startTimeout: 5000, logLevel: 'error' },
    )
  })

  it('should hand out a fresh controller on every call', () => {
    const createController = jest.fn<ControllerFactory>((name) => stubController(name))
    const registry = new BrowserRegistry({ Chrome: { flags: [] } }, { createController })

    const first = registry.getBrowser('Chrome')
    const second = registry.getBrowser('Chrome')

    expect(first).not.toBe(second)
    expect(createController).toHaveBeenCalledTimes(2)
  })

  it('should apply default controller options', () => {
    const createController = jest.fn<ControllerFactory>((name) => stubController(name))
    const registry = new BrowserRegistry({ Chrome: { flags: [] } }, { createController })

    registry.getBrowser('Chrome')

    expect(createController.mock.calls[0]?.[2]).toEqual({ headless: false, startTimeout: 30000, logLevel: 'error' })
  })

  it('should reject an unknown selector', () => {
    const registry = new BrowserRegistry({ Chrome: { flags: [] } })

    expect(() => registry.getBrowser('Firefox')).toThrow(BrowserRegistryError)
    expect(() => registry.getBrowser('Firefox')).toThrow('Invalid browser - Firefox')
  })
})
