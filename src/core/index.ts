export {BootstrapRunner, bootstrapPaths} from './orchestrator.js'
export type {BootstrapRunnerOptions, PhaseReport} from './orchestrator.js'
export {StepRunner, type StepOutcome} from './step-runner.js'
export {StateStore, MarkerFileAdapter, MemoryAdapter} from './state-store.js'
export type {PersistenceAdapter, StepStatus} from './state-store.js'
export {ActionLog, actionLogPath} from './action-log.js'
export type {LoggedActionRequest, LoggedActionResult} from './action-log.js'
export {ArchiveResolver, archiveStem, archiveSuffixes} from './archive-resolver.js'
export type {ArchiveResolution, ArchiveSuffix} from './archive-resolver.js'
export {buildRecipe} from './package-builder.js'
export {ConsoleReporter, CompositeReporter} from './reporter.js'
export type {
  Reporter,
  StepRef,
  JobContext,
  BootstrapEvent,
  RunStartEvent,
  PhaseStartEvent,
  PhaseSkippedEvent,
  PhaseFinishedEvent,
  PhaseFailedEvent,
  StepStartingEvent,
  StepSkippedEvent,
  StepWouldRunEvent,
  StepFinishedEvent,
  StepFailedEvent,
  StepLogEvent,
  StepNoticeEvent,
  PackageUnsupportedEvent,
  RunFinishedEvent,
  RunFailedEvent
} from './reporter.js'
export {formatDuration, sanitizeName, shellQuote, availableJobs, targetTriple} from './utils.js'
