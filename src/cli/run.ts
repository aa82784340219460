/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { createControlLoop, type ControlLoop, type Job, type Task } from '../core'
import { logger } from '../logger'
import { exitWithError, resolveAgentConfig, withAgentOptions } from './agent-options'
import type { AgentArgs, BaseArgs } from './types'

export const runCommand: CommandModule<BaseArgs, AgentArgs> = {
  command: ['run', '$0'],
  describe: 'Poll the coordinator for work and run tests until interrupted',
  builder: (yargs) => {
    return withAgentOptions(yargs)
      .example('$0 --server https://coordinator.example/work/ --location Dulles', 'Run the agent for one location')
      .example('$0 run --chrome /usr/bin/google-chrome -vvv', 'Use a specific Chrome build with info logging')
  },
  handler: async (argv) => {
    try {
      await runAgent(argv)
    } catch (error) {
      exitWithError(error)
    }
  },
}

async function runAgent(args: AgentArgs): Promise<void> {
  const config = await resolveAgentConfig(args)

  if (Object.keys(config.browsers).length === 0) {
    console.error('No browsers configured. Add a "browsers" section to agent.config.json or pass --chrome.')
    process.exit(1)
  }

  logger.info(`Agent ${config.name} polling ${config.server} for location ${config.location}`)

  const agent = createControlLoop(config)
  const onSignal = () => agent.requestExit()

  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  setupProgressHandlers(agent)

  console.log('Running agent, hit Ctrl+C to exit')
  try {
    await agent.run()
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
  }
  console.log('Done')
}

/**
 * Set up progress logging for the agent loop
 */
function setupProgressHandlers(agent: ControlLoop): void {
  let completedJobs = 0

  agent.on('taskStart', (task: Task) => {
    logger.info(`⏳ Test ${task.jobId}: run ${task.run}${task.cached ? ' (repeat view)' : ''}`)
  })

  agent.on('taskComplete', (task: Task) => {
    if (task.error) {
      logger.error(`❌ Test ${task.jobId} run ${task.run}: ${task.error}`)
    } else {
      logger.info(`✅ Test ${task.jobId} run ${task.run}${task.cached ? ' (repeat view)' : ''} uploaded`)
    }
  })

  agent.on('jobComplete', (job: Job) => {
    completedJobs++
    logger.info(`🏁 Test ${job.id} complete (${completedJobs} job(s) this session)`)
  })
}
