import type {WriteStream} from 'node:fs'
import {mkdir, open} from 'node:fs/promises'
import {join} from 'node:path'
import type {ActionExecutor, ActionRequest, ActionResult, OnLogLine} from '../engine/index.js'
import {ActionFailedError} from '../errors.js'
import {sanitizeName} from './utils.js'

export type LoggedActionRequest = ActionRequest & {
  /** Package or step the action belongs to */
  subject: string;
  /** Build phase of the action (extract, configure, make, install…) */
  label: string;
  /** When true a non-zero exit is returned instead of thrown */
  optional?: boolean;
}

export type LoggedActionResult = ActionResult & {
  logPath: string;
}

export function actionLogPath(logDir: string, subject: string, label: string): string {
  return join(logDir, `${sanitizeName(subject)}-${sanitizeName(label)}.log`)
}

/**
 * Wraps one external action and captures its combined stdout/stderr into
 * `<logDir>/<subject>-<label>.log`. The file is rewritten on every run so it
 * always reflects the latest attempt.
 */
export class ActionLog {
  constructor(
    private readonly executor: ActionExecutor,
    readonly logDir: string
  ) {}

  logPath(subject: string, label: string): string {
    return actionLogPath(this.logDir, subject, label)
  }

  /**
   * @throws ActionFailedError when the action exits non-zero and is not optional
   */
  async run(request: LoggedActionRequest, onLogLine?: OnLogLine): Promise<LoggedActionResult> {
    const {subject, label, optional, ...action} = request
    const logPath = this.logPath(subject, label)
    await mkdir(this.logDir, {recursive: true})

    // Opened up front so an unwritable log fails the step before the action starts
    const handle = await open(logPath, 'w')
    const log = handle.createWriteStream()
    let writeError: Error | undefined
    log.on('error', error => {
      writeError ??= error
    })
    log.write(`$ ${action.cmd.join(' ')}\n`)

    let result: ActionResult
    try {
      result = await this.executor.run(action, line => {
        log.write(line.line + '\n')
        onLogLine?.(line)
      })
    } catch (error) {
      await closeStream(log)
      throw error
    }

    if (result.error) {
      log.write(`[rootstrap] ${result.error}\n`)
    }

    await closeStream(log)
    if (writeError) {
      throw writeError
    }

    if (result.exitCode !== 0 && !optional) {
      throw new ActionFailedError(subject, label, result.exitCode, logPath)
    }

    return {...result, logPath}
  }
}

async function closeStream(stream: WriteStream): Promise<void> {
  if (stream.destroyed) {
    return
  }

  return new Promise((resolve, reject) => {
    stream.end(() => {
      resolve()
    })
    stream.on('error', reject)
  })
}
