import {randomUUID} from 'node:crypto'
import {mkdir} from 'node:fs/promises'
import {join} from 'node:path'
import type {ActionExecutor} from '../engine/index.js'
import {OrchestrationError, StepFailedError} from '../errors.js'
import type {
  BootstrapConfig,
  BootstrapPaths,
  BuildContext,
  ExecutionContext,
  Phase,
  PhaseState,
  PlanEntry
} from '../types.js'
import {ActionLog} from './action-log.js'
import {ArchiveResolver} from './archive-resolver.js'
import type {JobContext, Reporter, StepRef} from './reporter.js'
import {StateStore, type StepStatus} from './state-store.js'
import {StepRunner} from './step-runner.js'
import {availableJobs, targetTriple} from './utils.js'

export type BootstrapRunnerOptions = {
  executor: ActionExecutor;
  reporter: Reporter;
  config: BootstrapConfig;
  context: ExecutionContext;
  /** Defaults to the marker-file store of the execution context. */
  store?: StateStore;
  /** Defaults to the number of available processing units. */
  jobs?: number;
  /** Defaults to the triple of the current machine. */
  target?: string;
}

export type PhaseReport = {
  id: string;
  title: string;
  enabled: boolean;
  state: PhaseState;
  steps: Array<{id: string; status: StepStatus}>;
  unsupported: string[];
}

/** Tools every real run needs before the first phase starts. */
const requiredTools = ['tar']

export function bootstrapPaths(context: ExecutionContext, config: BootstrapConfig): BootstrapPaths {
  return {
    root: context.root,
    sources: join(context.root, 'sources'),
    tools: join(context.root, 'tools'),
    work: join(context.root, 'build', context.environment),
    logs: config.logDir,
    markers: StateStore.markerDir(context)
  }
}

type PlannedPhase = {
  phase: Phase;
  enabled: boolean;
  entries: PlanEntry[];
}

/**
 * Drives the bootstrap as a strictly sequential state machine over a fixed
 * list of phases.
 *
 * ## Workflow
 *
 * 1. **Planning**: every phase's plan is computed up front; phases must
 *    belong to the runner's environment and step IDs must be unique
 * 2. **Execution**: phases run in order, steps within a phase run in order:
 *    a. Step has a marker: skipped without invoking its action
 *    b. Unsupported package: reported, loop continues
 *    c. Otherwise: the action runs, and the marker is written on success
 * 3. **Failure**: the first failing step marks its phase `failed`, and the
 *    run stops with a StepFailedError naming the step, phase and log file
 *
 * Position survives restarts only through the state store: a later
 * invocation skips every marked step and resumes at the first unmarked one.
 */
export class BootstrapRunner {
  readonly paths: BootstrapPaths
  private readonly store: StateStore
  private readonly archives: ArchiveResolver
  private readonly actionLog: ActionLog
  private readonly jobs: number
  private readonly target: string
  private readonly states = new Map<string, PhaseState>()

  constructor(private readonly options: BootstrapRunnerOptions) {
    this.paths = bootstrapPaths(options.context, options.config)
    this.store = options.store ?? StateStore.forContext(options.context)
    this.archives = new ArchiveResolver(this.paths.sources)
    this.actionLog = new ActionLog(options.executor, this.paths.logs)
    this.jobs = options.jobs ?? availableJobs()
    this.target = options.target ?? targetTriple()
  }

  /** Phase states of the current (or last) run, in execution order. */
  get phaseStates(): ReadonlyMap<string, PhaseState> {
    return this.states
  }

  /**
   * @returns the state vector once every enabled phase is done (or, in a dry
   *   run, planned)
   * @throws StepFailedError at the first failing step
   */
  async run(phases: Phase[], options?: {dryRun?: boolean}): Promise<PhaseReport[]> {
    const {reporter, executor, context} = this.options
    const dryRun = options?.dryRun ?? false
    const planned = this.planAll(phases)
    const job: JobContext = {environment: context.environment, jobId: randomUUID()}
    const runner = new StepRunner(this.store, reporter, job)
    const startedAt = Date.now()

    this.states.clear()
    for (const {phase} of planned) {
      this.states.set(phase.id, 'pending')
    }

    if (!dryRun) {
      await executor.check(requiredTools)
      await mkdir(this.paths.logs, {recursive: true})
    }

    reporter.emit({
      ...job,
      event: 'RUN_START',
      root: context.root,
      phases: planned.filter(p => p.enabled).map(({phase}) => ({id: phase.id, title: phase.title})),
      dryRun
    })

    for (const {phase, enabled, entries} of planned) {
      if (!enabled) {
        reporter.emit({...job, event: 'PHASE_SKIPPED', phaseId: phase.id, title: phase.title, reason: 'disabled'})
        continue
      }

      this.states.set(phase.id, 'running')
      reporter.emit({...job, event: 'PHASE_START', phaseId: phase.id, title: phase.title})

      let pending = 0
      for (const entry of entries) {
        if (entry.kind === 'unsupported') {
          reporter.emit({...job, event: 'PACKAGE_UNSUPPORTED', phaseId: phase.id, name: entry.name})
          continue
        }

        const step: StepRef = {id: entry.id, displayName: entry.name ?? entry.id, phaseId: phase.id}

        if (dryRun) {
          if (await runner.plan(step) === 'would-run') {
            pending++
          }

          continue
        }

        const outcome = await runner.run(step, async () => entry.action(this.buildContext(step, job)))
        if (outcome.status === 'failed') {
          this.states.set(phase.id, 'failed')
          reporter.emit({...job, event: 'PHASE_FAILED', phaseId: phase.id, title: phase.title, stepId: step.id})
          reporter.emit({...job, event: 'RUN_FAILED', phaseId: phase.id, stepId: step.id, logPath: outcome.logPath})
          throw new StepFailedError(step.id, phase.id, outcome.logPath, {cause: outcome.error})
        }
      }

      this.states.set(phase.id, pending > 0 ? 'pending' : 'done')
      reporter.emit({...job, event: 'PHASE_FINISHED', phaseId: phase.id, title: phase.title})
    }

    reporter.emit({...job, event: 'RUN_FINISHED', durationMs: Date.now() - startedAt})

    const reports = await this.status(phases)
    return reports.map(report => ({...report, state: this.states.get(report.id) ?? report.state}))
  }

  /**
   * Derives the persisted state vector from the markers alone. A phase is
   * `done` when every one of its steps has a marker.
   */
  async status(phases: Phase[]): Promise<PhaseReport[]> {
    const reports: PhaseReport[] = []
    for (const {phase, enabled, entries} of this.planAll(phases)) {
      const steps: PhaseReport['steps'] = []
      const unsupported: string[] = []
      for (const entry of entries) {
        if (entry.kind === 'unsupported') {
          unsupported.push(entry.name)
        } else {
          steps.push({id: entry.id, status: await this.store.getStatus(entry.id)})
        }
      }

      const state: PhaseState = steps.every(s => s.status === 'done') ? 'done' : 'pending'
      reports.push({id: phase.id, title: phase.title, enabled, state, steps, unsupported})
    }

    return reports
  }

  private planAll(phases: Phase[]): PlannedPhase[] {
    const {config, context} = this.options
    const seen = new Set<string>()
    return phases.map(phase => {
      if (phase.environment !== context.environment) {
        throw new OrchestrationError('ENVIRONMENT_MISMATCH', `Phase ${phase.id} belongs to the ${phase.environment} environment, not ${context.environment}`)
      }

      const entries = phase.plan(config)
      for (const entry of entries) {
        if (entry.kind !== 'step') {
          continue
        }

        if (seen.has(entry.id)) {
          throw new OrchestrationError('DUPLICATE_STEP', `Step ID ${entry.id} is planned more than once`)
        }

        seen.add(entry.id)
      }

      return {phase, enabled: phase.enabled?.(config) ?? true, entries}
    })
  }

  private buildContext(step: StepRef, job: JobContext): BuildContext {
    const {executor, reporter, config, context} = this.options
    return {
      context,
      config,
      paths: this.paths,
      jobs: this.jobs,
      target: this.target,
      archives: this.archives,
      exec: async ({subject, label, cmd, cwd, env, optional}) => {
        const result = await this.actionLog.run(
          {subject: subject ?? step.id, label, cmd, cwd, env, optional},
          ({stream, line}) => {
            reporter.emit({...job, event: 'STEP_LOG', step, stream, line})
          }
        )
        if (result.exitCode !== 0) {
          reporter.emit({...job, event: 'STEP_NOTICE', step, message: `Optional action ${label} exited with code ${result.exitCode}, see ${result.logPath}`})
        }

        return {exitCode: result.exitCode, logPath: result.logPath}
      },
      probe: async (cmd, cwd) => {
        const result = await executor.run({cmd, cwd}, () => {/* discarded */})
        return result.exitCode === 0
      },
      notice(message) {
        reporter.emit({...job, event: 'STEP_NOTICE', step, message})
      }
    }
  }
}
