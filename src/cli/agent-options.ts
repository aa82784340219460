import type { Argv } from 'yargs'
import { ConfigLoadError, ConfigValidationError, loadConfig, type AgentConfig } from '../core'
import { levelFromVerbosity, logger } from '../logger'
import type { AgentArgs, BaseArgs } from './types'

export function withAgentOptions<T extends BaseArgs>(yargs: Argv<T>) {
  return yargs
    .option('server', {
      type: 'string',
      describe: 'URL for work (i.e. https://coordinator.example/work/)',
    })
    .option('location', {
      type: 'string',
      describe: 'Location ID (as configured on the server)',
    })
    .option('key', {
      type: 'string',
      describe: 'Location key (optional)',
    })
    .option('name', {
      type: 'string',
      describe: 'Agent name (for the work directory, defaults to the host name)',
    })
    .option('chrome', {
      type: 'string',
      describe: 'Path to Chrome executable (if configured)',
    })
    .option('canary', {
      type: 'string',
      describe: 'Path to Chrome canary executable (if configured)',
    })
    .option('work-dir', {
      type: 'string',
      describe: 'Root directory for agent working files',
    })
    .option('headless', {
      type: 'boolean',
      describe: 'Run browsers headless',
    })
}

/**
 * Applies `-v` verbosity and resolves the agent configuration from file, env and flags
 */
export async function resolveAgentConfig(args: AgentArgs): Promise<AgentConfig> {
  logger.setLevel(levelFromVerbosity(args.verbose ?? 0))

  const cliArgs: Record<string, unknown> = {
    server: args.server,
    location: args.location,
    key: args.key,
    name: args.name,
    workDir: args.workDir,
    headless: args.headless,
  }

  return loadConfig({
    configPath: args.config,
    cliArgs: Object.fromEntries(Object.entries(cliArgs).filter(([, value]) => value !== undefined)),
    browserPaths: { chrome: args.chrome, canary: args.canary },
  })
}

/**
 * Prints a startup failure and exits with status 1
 */
export function exitWithError(error: unknown): never {
  /* eslint-disable no-console */
  if (error instanceof ConfigLoadError) {
    console.error('❌ Failed to load configuration:')
    console.error(error.message)
  } else if (error instanceof ConfigValidationError) {
    console.error('❌ Configuration validation failed:')
    console.error(error.getErrorSummary())
  } else {
    console.error('❌ Unexpected error:', error)
  }
  /* eslint-enable no-console */
  process.exit(1)
}
