import chalk from 'chalk'
import type {Command} from 'commander'
import {BootstrapRunner} from '../../core/orchestrator.js'
import {ProcessExecutor} from '../../engine/process-executor.js'
import {phasesFor} from '../../phases/index.js'
import {createReporter, environmentOption, getGlobalOptions, loadSettings, toEnvironment} from '../utils.js'

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show phase and step progress from the persisted markers')
    .addOption(environmentOption())
    .action(async (options: {environment: string}, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const environment = toEnvironment(options.environment)
      const config = await loadSettings(global, environment, {requirePartitions: false})
      const runner = new BootstrapRunner({
        executor: new ProcessExecutor(),
        reporter: createReporter(global),
        config,
        context: {root: config.root, environment}
      })

      const reports = await runner.status(phasesFor(environment))

      if (global.json) {
        console.log(JSON.stringify(reports, null, 2))
        return
      }

      for (const report of reports) {
        const state = report.state === 'done' ? chalk.green(report.state) : chalk.yellow(report.state)
        const disabled = report.enabled ? '' : chalk.gray(' (disabled)')
        console.log(chalk.bold(`${report.title}`) + ` ${state}${disabled}`)
        for (const step of report.steps) {
          const symbol = step.status === 'done' ? chalk.green('✓') : chalk.gray('○')
          console.log(`  ${symbol} ${step.id}`)
        }

        for (const name of report.unsupported) {
          console.log(`  ${chalk.yellow('–')} ${chalk.gray(`${name} (no recipe)`)}`)
        }
      }
    })
}
