#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {RootstrapError} from '../errors.js'
import {registerLogsCommand} from './commands/logs.js'
import {registerPackagesCommand} from './commands/packages.js'
import {registerResetCommand} from './commands/reset.js'
import {registerRunCommand} from './commands/run.js'
import {registerStatusCommand} from './commands/status.js'
import {defaultConfigFile} from './config.js'

async function main() {
  const program = new Command()

  program
    .name('rootstrap')
    .description('Resumable root filesystem and toolchain bootstrap')
    .version('0.1.0')
    .option('--root <path>', 'Root of the tree under construction (env: ROOTSTRAP_ROOT)')
    .option('--log-dir <path>', 'Directory for action logs (env: BUILD_LOG_DIR)')
    .option('--config <file>', 'Configuration file', defaultConfigFile)
    .option('--json', 'Output structured JSON logs')

  registerRunCommand(program)
  registerStatusCommand(program)
  registerResetCommand(program)
  registerLogsCommand(program)
  registerPackagesCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof RootstrapError) {
    console.error(chalk.red(error.message))
    process.exitCode = 1
  } else {
    console.error('Fatal error:', error)
    throw error
  }
}
