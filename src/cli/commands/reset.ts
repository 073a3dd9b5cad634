import chalk from 'chalk'
import type {Command} from 'commander'
import {StateStore} from '../../core/state-store.js'
import {environmentOption, getGlobalOptions, loadSettings, toEnvironment} from '../utils.js'

export function registerResetCommand(program: Command): void {
  program
    .command('reset')
    .description('Clear step markers so the next run executes those steps again')
    .argument('<step...>', 'Step IDs')
    .addOption(environmentOption())
    .action(async (steps: string[], options: {environment: string}, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const environment = toEnvironment(options.environment)
      const config = await loadSettings(global, environment, {requirePartitions: false})
      const store = StateStore.forContext({root: config.root, environment})

      for (const stepId of steps) {
        if (await store.clear(stepId)) {
          console.log(chalk.green(`Cleared ${chalk.bold(stepId)}`))
        } else {
          console.log(chalk.gray(`No marker for ${stepId}`))
        }
      }
    })
}
