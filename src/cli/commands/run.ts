import process from 'node:process'
import {join} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {BootstrapRunner} from '../../core/orchestrator.js'
import {StateStore} from '../../core/state-store.js'
import {ProcessExecutor} from '../../engine/process-executor.js'
import {StepFailedError} from '../../errors.js'
import {phasesFor} from '../../phases/index.js'
import {continuationScriptPath, enterScriptPath} from '../../phases/transition.js'
import type {BootstrapConfig} from '../../types.js'
import {assertPrivileged} from '../config.js'
import {createReporter, environmentOption, getGlobalOptions, loadSettings, toEnvironment} from '../utils.js'

type RunOptions = {
  environment: string;
  dryRun?: boolean;
  verbose?: boolean;
  withPackageManager?: boolean;
  installKernel?: boolean;
}

/** Operator instructions printed once the host side is complete. */
export function nextSteps(config: BootstrapConfig): string[] {
  return [
    'Next steps:',
    ` 1) Make sure every source archive is present in ${join(config.root, 'sources')}.`,
    ' 2) Make the rootstrap command available inside the target root.',
    ` 3) Run ${join(config.root, enterScriptPath)} to enter the target root.`,
    ` 4) Inside it, run ${continuationScriptPath}.`,
    '',
    `Progress markers: ${StateStore.markerDir({root: config.root, environment: 'host'})}`,
    `Logs: ${config.logDir}`,
    'After a reboot, run `rootstrap reset mount-pseudos` before resuming.'
  ]
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run (or resume) the bootstrap phases of an environment')
    .addOption(environmentOption())
    .option('--dry-run', 'Show which steps would run without executing anything')
    .option('--verbose', 'Stream action output in real-time (interactive mode)')
    .option('--with-package-manager', 'Enable the GNU Guix phase (host)')
    .option('--install-kernel', 'Enable the kernel installation phase (target root)')
    .action(async (options: RunOptions, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const environment = toEnvironment(options.environment)
      const config = await loadSettings(global, environment, {
        flags: {packageManager: options.withPackageManager, installKernel: options.installKernel}
      })
      const dryRun = options.dryRun ?? false
      if (!dryRun) {
        assertPrivileged(process.getuid?.())
      }

      const runner = new BootstrapRunner({
        executor: new ProcessExecutor(),
        reporter: createReporter(global, {verbose: options.verbose}),
        config,
        context: {root: config.root, environment}
      })

      try {
        await runner.run(phasesFor(environment), {dryRun})
      } catch (error: unknown) {
        if (error instanceof StepFailedError) {
          console.error(chalk.red(`Step ${chalk.bold(error.stepId)} failed in phase ${chalk.bold(error.phaseId)}`))
          if (error.logPath) {
            console.error(chalk.red(`Log: ${error.logPath}`))
          }

          process.exitCode = 1
          return
        }

        throw error
      }

      if (environment === 'host' && !dryRun && !global.json) {
        console.log(nextSteps(config).join('\n'))
      }
    })
}
