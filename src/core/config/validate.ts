import { ZodError } from 'zod'
import { AgentConfig, AgentConfigSchema } from '../types'
import { ConfigValidationError } from './errors'

/**
 * Validates a configuration object against the schema
 * @param config Raw configuration object to validate
 * @returns Validated and normalized AgentConfig
 * @throws ConfigValidationError if validation fails
 */
export default function validateConfig(config: unknown): AgentConfig {
  try {
    return AgentConfigSchema.parse(config)
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError('Configuration validation failed', error.issues)
    }
    throw error
  }
}
