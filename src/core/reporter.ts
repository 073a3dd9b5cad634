import pino from 'pino'
import type {EnvironmentKind} from '../types.js'

/** Reference to a step for display and keying purposes. */
export type StepRef = {
  id: string;
  displayName: string;
  phaseId: string;
}

/** Common fields identifying one orchestrator invocation. */
export type JobContext = {
  environment: EnvironmentKind;
  jobId: string;
}

/**
 * Discriminated union of bootstrap execution events.
 *
 * Lifecycle:
 * 1. RUN_START - Orchestrator invocation begins
 * 2. For each phase:
 *    a. PHASE_START - or PHASE_SKIPPED when an optional phase is disabled
 *    b. For each plan entry:
 *       - STEP_SKIPPED - Marker present, action not invoked
 *         OR STEP_WOULD_RUN - No marker (dry-run mode)
 *         OR STEP_STARTING, then STEP_LOG / STEP_NOTICE while the action runs,
 *            then STEP_FINISHED (marker written) or STEP_FAILED (no marker)
 *       - PACKAGE_UNSUPPORTED - No recipe; loop continues
 *    c. PHASE_FINISHED - or PHASE_FAILED, which halts the run
 * 3. RUN_FINISHED - Every enabled phase is done
 *    OR RUN_FAILED - Stopped at the first failing step
 */
export type RunStartEvent = JobContext & {
  event: 'RUN_START';
  root: string;
  phases: Array<{id: string; title: string}>;
  dryRun: boolean;
}

export type PhaseStartEvent = JobContext & {
  event: 'PHASE_START';
  phaseId: string;
  title: string;
}

export type PhaseSkippedEvent = JobContext & {
  event: 'PHASE_SKIPPED';
  phaseId: string;
  title: string;
  reason: 'disabled';
}

export type PhaseFinishedEvent = JobContext & {
  event: 'PHASE_FINISHED';
  phaseId: string;
  title: string;
}

export type PhaseFailedEvent = JobContext & {
  event: 'PHASE_FAILED';
  phaseId: string;
  title: string;
  stepId: string;
}

export type StepStartingEvent = JobContext & {
  event: 'STEP_STARTING';
  step: StepRef;
}

export type StepSkippedEvent = JobContext & {
  event: 'STEP_SKIPPED';
  step: StepRef;
  reason: 'marker';
}

export type StepWouldRunEvent = JobContext & {
  event: 'STEP_WOULD_RUN';
  step: StepRef;
}

export type StepFinishedEvent = JobContext & {
  event: 'STEP_FINISHED';
  step: StepRef;
  durationMs: number;
}

export type StepFailedEvent = JobContext & {
  event: 'STEP_FAILED';
  step: StepRef;
  message: string;
  logPath?: string;
}

export type StepLogEvent = JobContext & {
  event: 'STEP_LOG';
  step: StepRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type StepNoticeEvent = JobContext & {
  event: 'STEP_NOTICE';
  step: StepRef;
  message: string;
}

export type PackageUnsupportedEvent = JobContext & {
  event: 'PACKAGE_UNSUPPORTED';
  phaseId: string;
  name: string;
}

export type RunFinishedEvent = JobContext & {
  event: 'RUN_FINISHED';
  durationMs: number;
}

export type RunFailedEvent = JobContext & {
  event: 'RUN_FAILED';
  phaseId: string;
  stepId: string;
  logPath?: string;
}

export type BootstrapEvent =
  | RunStartEvent
  | PhaseStartEvent
  | PhaseSkippedEvent
  | PhaseFinishedEvent
  | PhaseFailedEvent
  | StepStartingEvent
  | StepSkippedEvent
  | StepWouldRunEvent
  | StepFinishedEvent
  | StepFailedEvent
  | StepLogEvent
  | StepNoticeEvent
  | PackageUnsupportedEvent
  | RunFinishedEvent
  | RunFailedEvent

/**
 * Interface for reporting bootstrap execution events.
 */
export type Reporter = {
  /** Reports run, phase and step state transitions */
  emit(event: BootstrapEvent): void;
}

const warnings = new Set<BootstrapEvent['event']>(['PACKAGE_UNSUPPORTED', 'STEP_NOTICE'])
const errors = new Set<BootstrapEvent['event']>(['STEP_FAILED', 'PHASE_FAILED', 'RUN_FAILED'])

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for unattended runs and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'})

  emit(event: BootstrapEvent): void {
    if (errors.has(event.event)) {
      this.logger.error(event)
    } else if (warnings.has(event.event)) {
      this.logger.warn(event)
    } else {
      this.logger.info(event)
    }
  }
}

/**
 * Delegates emit() to multiple reporters.
 */
export class CompositeReporter implements Reporter {
  private readonly reporters: Reporter[]

  constructor(...reporters: Reporter[]) {
    this.reporters = reporters
  }

  emit(event: BootstrapEvent): void {
    for (const reporter of this.reporters) {
      reporter.emit(event)
    }
  }
}
