// ---------------------------------------------------------------------------
// Shared bootstrap domain types.
//
// Used by the orchestrator, the phase definitions and the CLI. Recipe types
// live with the recipe registry in src/recipes/.
// ---------------------------------------------------------------------------

import type {ArchiveResolver} from './core/archive-resolver.js'

// -- Execution context -------------------------------------------------------

/** Where the orchestrator is running: on the host, or inside the target root. */
export type EnvironmentKind = 'host' | 'target-root'

export const environmentKinds: readonly EnvironmentKind[] = ['host', 'target-root']

export function isEnvironmentKind(value: string): value is EnvironmentKind {
  return value === 'host' || value === 'target-root'
}

export type ExecutionContext = {
  /** Absolute path of the tree under construction, as seen from this environment. */
  root: string;
  environment: EnvironmentKind;
}

/** Resolved configuration surface, identical in both environments. */
export type BootstrapConfig = {
  root: string;
  disk: string;
  rootPartition: string;
  homePartition: string;
  swapPartition: string;
  hostName: string;
  /** Kernel version label used for /boot file names and the boot menu. */
  kernelVersion: string;
  logDir: string;
  /** Unprivileged user that owns the toolchain build on the host. */
  buildUser: string;
  /** Enables the optional package-manager bootstrap phase. */
  packageManager: boolean;
  /** Enables the optional kernel installation phase inside the target root. */
  installKernel: boolean;
}

/** Well-known directories derived from the execution context. */
export type BootstrapPaths = {
  root: string;
  /** Flat directory of versioned source archives. */
  sources: string;
  tools: string;
  /** Per-environment extraction and build area. */
  work: string;
  logs: string;
  markers: string;
}

// -- Step actions ------------------------------------------------------------

export type ExecOptions = {
  /** Log label; output is captured to `{subject}-{label}.log`. */
  label: string;
  cmd: string[];
  cwd: string;
  env?: Record<string, string>;
  /** Defaults to the running step ID. */
  subject?: string;
  /** When true a non-zero exit is reported as a notice instead of failing the step. */
  optional?: boolean;
}

export type ExecResult = {
  exitCode: number;
  logPath: string;
}

/**
 * Everything a step action may touch. Bound to one step: logs default to the
 * step ID as subject and notices are attributed to the step.
 */
export type BuildContext = {
  context: ExecutionContext;
  config: BootstrapConfig;
  paths: BootstrapPaths;
  /** Worker count for parallel compile actions. */
  jobs: number;
  /** Cross-compilation target triple. */
  target: string;
  archives: ArchiveResolver;
  exec(options: ExecOptions): Promise<ExecResult>;
  /** Runs a command without log capture and reports whether it exited 0. */
  probe(cmd: string[], cwd: string): Promise<boolean>;
  notice(message: string): void;
}

export type StepAction = (build: BuildContext) => Promise<void>

// -- Phases ------------------------------------------------------------------

export type StepEntry = {
  kind: 'step';
  id: string;
  /** Human-readable display name. Falls back to `id` when absent. */
  name?: string;
  action: StepAction;
}

/** A package in the fixed list that has no recipe; reported and skipped. */
export type UnsupportedEntry = {
  kind: 'unsupported';
  name: string;
}

export type PlanEntry = StepEntry | UnsupportedEntry

export type Phase = {
  id: string;
  title: string;
  environment: EnvironmentKind;
  /** Optional phases run only when this returns true. */
  enabled?: (config: BootstrapConfig) => boolean;
  plan(config: BootstrapConfig): PlanEntry[];
}

export type PhaseState = 'pending' | 'running' | 'done' | 'failed'
