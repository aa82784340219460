/* eslint-disable no-console */

import type { CommandModule } from 'yargs'
import * as path from 'node:path'
import { BrowserRegistry } from '../browser'
import { exitWithError, resolveAgentConfig, withAgentOptions } from './agent-options'
import type { BaseArgs, PrintConfigArgs } from './types'

export const printConfigCommand: CommandModule<BaseArgs, PrintConfigArgs> = {
  command: 'print-config',
  describe: 'Show the resolved and validated configuration',
  builder: (yargs) => {
    return withAgentOptions(yargs).option('format', {
      alias: 'f',
      type: 'string',
      choices: ['json'] as const,
      default: 'json',
      describe: 'Output format for the configuration',
    })
  },
  handler: async (argv) => {
    try {
      const config = await resolveAgentConfig(argv)
      const registry = new BrowserRegistry(config.browsers)

      const output = {
        ...config,
        key: config.key === undefined ? undefined : '<redacted>',
        _agentDir: path.join(config.workDir, config.name),
        _browsers: registry.listBrowsers(),
      }

      console.log(JSON.stringify(output, null, 2))

      if (!registry.isReady()) {
        console.error('⚠️  No browsers configured; the agent will not request work')
      }
    } catch (error) {
      exitWithError(error)
    }
  },
}
