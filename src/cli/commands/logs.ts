import process from 'node:process'
import {readFile} from 'node:fs/promises'
import chalk from 'chalk'
import type {Command} from 'commander'
import {actionLogPath} from '../../core/action-log.js'
import {isNotFound} from '../../core/utils.js'
import {getGlobalOptions, loadSettings} from '../utils.js'

export function registerLogsCommand(program: Command): void {
  program
    .command('logs')
    .description('Print the log of an action')
    .argument('<subject>', 'Recipe or step ID (e.g. binutils-pass1)')
    .argument('<label>', 'Action label (e.g. configure, make, install)')
    .action(async (subject: string, label: string, _options: Record<string, unknown>, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const config = await loadSettings(global, 'host', {requirePartitions: false})
      const path = actionLogPath(config.logDir, subject, label)

      let content: string
      try {
        content = await readFile(path, 'utf8')
      } catch (error: unknown) {
        if (!isNotFound(error)) {
          throw error
        }

        console.error(chalk.red(`No log at ${path}`))
        process.exitCode = 1
        return
      }

      process.stdout.write(content)
    })
}
