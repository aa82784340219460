import { z } from 'zod'
import { logger } from '../../logger'

export const DEFAULT_IMAGE_QUALITY = 30

const FALSE_FLAGS = new Set(['', '0', 'false'])

// Any truthy value sets a flag; "0" and "false" strings count as unset
function isFlagSet(value: unknown): boolean {
  if (typeof value === 'string') {
    return !FALSE_FLAGS.has(value.trim().toLowerCase())
  }
  return Boolean(value)
}

const WireFlagSchema = z.preprocess(isFlagSet, z.boolean())

// Pre-built script command as sent by the coordinator
export const WireCommandSchema = z
  .object({
    command: z.enum(['navigate']),
    target: z.string().min(1, 'Command target is required'),
    record: z.preprocess((value) => value === undefined || isFlagSet(value), z.boolean()),
  })
  .transform(({ command, target, record }): ScriptCommand => ({ kind: command, target, record }))

/**
 * Keeps the commands this agent can run. Unknown or malformed entries are
 * skipped so the rest of the job still runs.
 */
function toScript(entries: unknown[]): ScriptCommand[] {
  const commands: ScriptCommand[] = []
  entries.forEach((entry, index) => {
    const result = WireCommandSchema.safeParse(entry)
    if (result.success) {
      commands.push(result.data)
    } else {
      logger.warn(`Skipping unsupported script command #${index + 1}: ${JSON.stringify(entry)}`)
    }
  })
  return commands
}

/**
 * Job payload returned by the coordinator's getwork endpoint.
 * Only `Test ID`, `browser` and `runs` are required; any other field that
 * cannot be read falls back to its default.
 */
export const JobPayloadSchema = z
  .object({
    'Test ID': z.string().min(1, 'Test ID is required'),
    browser: z.string().min(1, 'browser is required'),
    runs: z.coerce.number().int().positive(),
    fvonly: WireFlagSchema,
    iq: z.coerce.number().int().min(1).max(100).catch(DEFAULT_IMAGE_QUALITY),
    pngss: WireFlagSchema,
    'Capture Video': WireFlagSchema,
    timeout: z.coerce.number().positive().optional().catch(undefined),
    script: z.array(z.unknown()).optional().catch(undefined),
    url: z.string().optional().catch(undefined),
  })
  .transform((payload) => ({
    id: payload['Test ID'],
    browser: payload.browser,
    runs: payload.runs,
    fvonly: payload.fvonly,
    imageQuality: payload.iq,
    captureFullSizeScreenshots: payload.pngss,
    captureVideo: payload['Capture Video'],
    timeLimit: payload.timeout,
    script: payload.script === undefined ? undefined : toScript(payload.script),
    url: payload.url || undefined,
  }))

export type JobPayload = z.input<typeof JobPayloadSchema>

export interface NavigateCommand {
  kind: 'navigate'
  target: string
  record: boolean
}

// Closed set of script commands, dispatched on `kind`
export type ScriptCommand = NavigateCommand

export interface JobState {
  run: number
  repeatView: boolean
  done: boolean
}

export interface Job {
  id: string
  browser: string
  runs: number
  fvonly: boolean
  imageQuality: number
  captureFullSizeScreenshots: boolean
  captureVideo: boolean
  /** Overrides the default task time limit, in seconds */
  timeLimit?: number
  script?: ScriptCommand[]
  url?: string
  /** Progress cursor, null until the first task is scheduled */
  state: JobState | null
}
