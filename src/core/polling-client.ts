import { fetch as undiciFetch } from 'undici'
import { logger } from '../logger'
import { JobPayloadSchema, type Job } from './types'

export type Fetch = typeof undiciFetch

export interface PollingClientConfig {
  server: string
  location: string
  name: string
  key?: string
  timeout?: number // ms, defaults to 30 seconds
  fetch?: Fetch
}

/**
 * Asks the coordinator for one job. Every failure mode, from network errors to
 * partial payloads, comes back as "no job available" so the caller can back off.
 */
export class PollingClient {
  private config: Required<Omit<PollingClientConfig, 'key'>> & Pick<PollingClientConfig, 'key'>

  constructor(config: PollingClientConfig) {
    this.config = {
      timeout: 30000,
      fetch: undiciFetch,
      ...config,
    }
  }

  getWorkUrl(): string {
    const url = new URL('getwork.php', this.config.server)
    url.searchParams.set('f', 'json')
    url.searchParams.set('location', this.config.location)
    url.searchParams.set('pc', this.config.name)
    if (this.config.key !== undefined) {
      url.searchParams.set('key', this.config.key)
    }
    return url.toString()
  }

  async fetchJob(): Promise<Job | null> {
    const url = this.getWorkUrl()
    logger.info(`Checking for work: ${url}`)

    let body: string
    try {
      const response = await this.config.fetch(url, { signal: AbortSignal.timeout(this.config.timeout) })
      body = await response.text()
    } catch (error) {
      logger.critical(`Get Work Error: ${error instanceof Error ? error.message : String(error)}`)
      return null
    }

    if (body.length === 0) {
      return null
    }

    return parseJob(body)
  }
}

/**
 * Parses a getwork response body into a Job with all defaults applied,
 * or null when it is not a usable job
 */
export function parseJob(body: string): Job | null {
  let payload: unknown
  try {
    payload = JSON.parse(body)
  } catch {
    logger.warn(`Discarding non-JSON work response (${body.length} bytes)`)
    return null
  }

  logger.debug(`Job: ${JSON.stringify(payload)}`)

  const result = JobPayloadSchema.safeParse(payload)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'job'}: ${issue.message}`)
    logger.warn(`Discarding invalid job: ${issues.join('; ')}`)
    return null
  }

  return { ...result.data, state: null }
}

export function createPollingClient(config: PollingClientConfig): PollingClient {
  return new PollingClient(config)
}
