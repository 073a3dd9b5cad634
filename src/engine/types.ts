/**
 * A single external command, run to completion in an explicit directory.
 */
export type ActionRequest = {
  /** Executable followed by its arguments */
  cmd: string[];
  /** Working directory; never inherited from a previous action */
  cwd: string;
  /** Extra environment variables, merged over the current process environment */
  env?: Record<string, string>;
}

/**
 * Result of a finished command.
 */
export type ActionResult = {
  /** Process exit code (non-zero also when the command could not be spawned) */
  exitCode: number;
  startedAt: Date;
  finishedAt: Date;
  /** Spawn or runtime error message, if any */
  error?: string;
}
