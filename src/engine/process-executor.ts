import {execa} from 'execa'
import {ToolNotAvailableError} from '../errors.js'
import type {ActionRequest, ActionResult} from './types.js'
import {ActionExecutor, type OnLogLine} from './executor.js'

export class ProcessExecutor extends ActionExecutor {
  async check(tools: string[]): Promise<void> {
    for (const tool of tools) {
      try {
        await execa(tool, ['--version'], {stdin: 'ignore'})
      } catch (error) {
        throw new ToolNotAvailableError(tool, {cause: error})
      }
    }
  }

  async run(request: ActionRequest, onLogLine: OnLogLine): Promise<ActionResult> {
    const startedAt = new Date()
    const [file, ...args] = request.cmd
    if (!file) {
      return {exitCode: 1, startedAt, finishedAt: new Date(), error: 'Empty command'}
    }

    let exitCode = 0
    let error: string | undefined

    try {
      const proc = execa(file, args, {
        cwd: request.cwd,
        env: request.env,
        stdin: 'ignore',
        buffer: false,
        reject: false
      })

      const stdoutDone = (async () => {
        for await (const line of proc.iterable({from: 'stdout'})) {
          onLogLine({stream: 'stdout', line})
        }
      })()

      const stderrDone = (async () => {
        for await (const line of proc.iterable({from: 'stderr'})) {
          onLogLine({stream: 'stderr', line})
        }
      })()

      const [result] = await Promise.all([proc, stdoutDone, stderrDone])
      if (result.failed) {
        exitCode = result.exitCode ?? 1
        error = result.exitCode === undefined ? failureReason(result, file) : undefined
      }
    } catch (error_) {
      exitCode = 1
      error = error_ instanceof Error ? error_.message : String(error_)
    }

    return {exitCode, startedAt, finishedAt: new Date(), error}
  }
}

/** Spawn error or terminating signal, as described by execa. */
function failureReason(result: object, file: string): string {
  if ('shortMessage' in result && typeof result.shortMessage === 'string') {
    return result.shortMessage
  }

  return `${file} did not exit normally`
}
