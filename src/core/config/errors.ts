import type { ZodIssue } from 'zod'

/**
 * Thrown when the merged agent configuration does not match the schema.
 * Startup aborts on this error; the agent never polls with a partial config.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly validationErrors: ZodIssue[],
  ) {
    super(message)
    this.name = 'ConfigValidationError'
  }

  // One `path: message` line per issue
  getErrorSummary(): string {
    return this.validationErrors
      .map((issue) => {
        const path = issue.path.map(String).join('.')
        return path ? `${path}: ${issue.message}` : issue.message
      })
      .join('\n')
  }
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}
