import type {ActionRequest, ActionResult} from './types.js'

/**
 * Log line from command execution.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time output during command execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface for running opaque build actions.
 *
 * Implementations:
 * - `ProcessExecutor`: spawns local processes via execa
 * - `FakeExecutor` (tests): records requests and replays scripted results
 *
 * The orchestrator only sees an exit code; what the command does
 * (configure, make, mount, mkfs…) is the executor's business.
 */
export abstract class ActionExecutor {
  /**
   * Verifies that the given tools are available.
   * @throws ToolNotAvailableError for the first missing tool
   */
  abstract check(tools: string[]): Promise<void>

  /**
   * Runs a command to completion. A non-zero exit is a result, not an error.
   * @param request - Command, working directory and environment
   * @param onLogLine - Callback for real-time stdout/stderr lines
   */
  abstract run(request: ActionRequest, onLogLine: OnLogLine): Promise<ActionResult>
}
