import {ActionFailedError} from '../errors.js'
import type {Reporter, StepRef, JobContext} from './reporter.js'
import type {StateStore} from './state-store.js'

export type StepOutcome =
  | {status: 'skipped'}
  | {status: 'done'; durationMs: number}
  | {status: 'failed'; error: Error; logPath?: string}

/**
 * Executes a named step at most once across process restarts.
 *
 * - Marker present: the action is not invoked (`skipped`).
 * - Action resolves: the marker is written, then `done` is returned.
 * - Action throws: no marker is written and `failed` is returned.
 *
 * There is no retry and no rollback. An action interrupted before its marker
 * is written runs again from scratch next time, so actions must tolerate
 * leftovers from a previous partial attempt.
 */
export class StepRunner {
  constructor(
    private readonly store: StateStore,
    private readonly reporter: Reporter,
    private readonly job: JobContext
  ) {}

  async run(step: StepRef, action: () => Promise<void>): Promise<StepOutcome> {
    if (await this.store.getStatus(step.id) === 'done') {
      this.reporter.emit({...this.job, event: 'STEP_SKIPPED', step, reason: 'marker'})
      return {status: 'skipped'}
    }

    this.reporter.emit({...this.job, event: 'STEP_STARTING', step})
    const startedAt = Date.now()

    try {
      await action()
    } catch (error_) {
      const error = error_ instanceof Error ? error_ : new Error(String(error_))
      const logPath = error instanceof ActionFailedError ? error.logPath : undefined
      this.reporter.emit({...this.job, event: 'STEP_FAILED', step, message: error.message, logPath})
      return {status: 'failed', error, logPath}
    }

    await this.store.setDone(step.id)
    const durationMs = Date.now() - startedAt
    this.reporter.emit({...this.job, event: 'STEP_FINISHED', step, durationMs})
    return {status: 'done', durationMs}
  }

  /**
   * Dry-run counterpart of run(): reports what would happen, invokes nothing.
   */
  async plan(step: StepRef): Promise<'skipped' | 'would-run'> {
    if (await this.store.getStatus(step.id) === 'done') {
      this.reporter.emit({...this.job, event: 'STEP_SKIPPED', step, reason: 'marker'})
      return 'skipped'
    }

    this.reporter.emit({...this.job, event: 'STEP_WOULD_RUN', step})
    return 'would-run'
  }
}
