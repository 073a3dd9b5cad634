/**
 * Library exports for programmatic use.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {BootstrapRunner, ProcessExecutor, ConsoleReporter, phasesFor} from 'rootstrap'
 *
 * const runner = new BootstrapRunner({
 *   executor: new ProcessExecutor(),
 *   reporter: new ConsoleReporter(),
 *   config,
 *   context: {root: config.root, environment: 'host'}
 * })
 *
 * await runner.run(phasesFor('host'))
 * ```
 */

export * from './core/index.js'
export {ActionExecutor, ProcessExecutor} from './engine/index.js'
export type {LogLine, OnLogLine, ActionRequest, ActionResult} from './engine/index.js'
export * from './recipes/index.js'
export {hostPhases, targetRootPhases, phasesFor} from './phases/index.js'
export {resolveConfig, loadConfigFile, parseConfigFile, assertPrivileged} from './cli/config.js'
export type {ConfigFile, ConfigFlags} from './cli/config.js'
export * from './errors.js'
export * from './types.js'
