/**
 * CLI command definitions and interfaces
 */

export interface BaseArgs {
  config?: string
  verbose?: number
}

// Options shared by `run` and `print-config`; each overrides the config file and environment
export interface AgentArgs extends BaseArgs {
  server?: string
  location?: string
  key?: string
  name?: string
  chrome?: string
  canary?: string
  workDir?: string
  headless?: boolean
}

export interface PrintConfigArgs extends AgentArgs {
  format?: string
}
