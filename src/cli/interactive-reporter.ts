import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {BootstrapEvent, Reporter, StepFailedEvent, StepFinishedEvent, StepRef} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for an operator watching the bootstrap.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly stepSpinners = new Map<string, Ora>()
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: BootstrapEvent): void {
    switch (event.event) {
      case 'RUN_START': {
        const mode = event.dryRun ? chalk.yellow(' (dry run)') : ''
        console.log(chalk.bold(`\n▶ Bootstrap ${chalk.cyan(event.environment)} at ${event.root}${mode}\n`))
        break
      }

      case 'PHASE_START': {
        console.log(chalk.bold(`  ${event.title}`))
        break
      }

      case 'PHASE_SKIPPED': {
        console.log(chalk.gray(`  ${event.title} (disabled)`))
        break
      }

      case 'PHASE_FINISHED': {
        break
      }

      case 'PHASE_FAILED': {
        console.log(chalk.red(`  ${event.title} failed at ${event.stepId}`))
        break
      }

      case 'STEP_STARTING': {
        const spinner = ora({text: event.step.displayName, prefixText: '   '}).start()
        this.stepSpinners.set(event.step.id, spinner)
        break
      }

      case 'STEP_SKIPPED': {
        console.log(`    ${chalk.gray('⊙')} ${chalk.gray(`${event.step.displayName} (done)`)}`)
        break
      }

      case 'STEP_WOULD_RUN': {
        console.log(`    ${chalk.yellow('○')} ${chalk.yellow(`${event.step.displayName} (would run)`)}`)
        break
      }

      case 'STEP_FINISHED': {
        this.handleStepFinished(event)
        break
      }

      case 'STEP_FAILED': {
        this.handleStepFailed(event)
        break
      }

      case 'STEP_LOG': {
        this.handleLog(event.step, event.stream, event.line)
        break
      }

      case 'STEP_NOTICE': {
        this.printAboveSpinner(event.step.id, chalk.yellow(`    ! ${event.message}`))
        break
      }

      case 'PACKAGE_UNSUPPORTED': {
        console.log(`    ${chalk.yellow('–')} ${chalk.yellow(`${event.name} (no recipe)`)}`)
        break
      }

      case 'RUN_FINISHED': {
        console.log(chalk.bold.green(`\n✓ Bootstrap ${event.environment} completed (${formatDuration(event.durationMs)})\n`))
        break
      }

      case 'RUN_FAILED': {
        console.log(chalk.bold.red('\n✗ Bootstrap stopped\n'))
        break
      }
    }
  }

  private handleLog(step: StepRef, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      this.printAboveSpinner(step.id, `${chalk.gray(`    [${step.id}]`)} ${line}`)
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(step.id)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(step.id, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private printAboveSpinner(stepId: string, text: string): void {
    const spinner = this.stepSpinners.get(stepId)
    if (spinner) {
      spinner.clear()
      console.log(text)
      spinner.render()
    } else {
      console.log(text)
    }
  }

  private handleStepFinished(event: StepFinishedEvent): void {
    const spinner = this.stepSpinners.get(event.step.id)
    if (spinner) {
      spinner.stopAndPersist({
        symbol: chalk.green('✓'),
        text: chalk.green(`${event.step.displayName} (${formatDuration(event.durationMs)})`)
      })
      this.stepSpinners.delete(event.step.id)
    }

    this.stderrBuffers.delete(event.step.id)
  }

  private handleStepFailed(event: StepFailedEvent): void {
    const spinner = this.stepSpinners.get(event.step.id)
    if (spinner) {
      spinner.stopAndPersist({symbol: chalk.red('✗'), text: chalk.red(event.step.displayName)})
      this.stepSpinners.delete(event.step.id)
    }

    console.log(chalk.red(`    ${event.message}`))

    const stderr = this.stderrBuffers.get(event.step.id)
    if (stderr && stderr.length > 0) {
      console.log(chalk.red('    ── stderr ──'))
      for (const line of stderr) {
        console.log(chalk.red(`    ${line}`))
      }
    }

    this.stderrBuffers.delete(event.step.id)
  }
}
