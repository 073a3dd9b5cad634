import process from 'node:process'
import {resolve} from 'node:path'
import {Option, type Command} from 'commander'
import {ConsoleReporter, type Reporter} from '../core/reporter.js'
import {ConfigurationError} from '../errors.js'
import {environmentKinds, isEnvironmentKind, type BootstrapConfig, type EnvironmentKind} from '../types.js'
import {loadConfigFile, resolveConfig, type ConfigFlags} from './config.js'
import {InteractiveReporter} from './interactive-reporter.js'

export type GlobalOptions = {
  root?: string;
  logDir?: string;
  config: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

export function environmentOption(): Option {
  return new Option('-e, --environment <kind>', 'Execution environment')
    .choices(environmentKinds)
    .default('host')
}

export function toEnvironment(value: string): EnvironmentKind {
  if (!isEnvironmentKind(value)) {
    throw new ConfigurationError('INVALID_ENVIRONMENT', `Unknown environment "${value}" (expected ${environmentKinds.join(' or ')})`)
  }

  return value
}

export async function loadSettings(
  global: GlobalOptions,
  environment: EnvironmentKind,
  options?: {flags?: ConfigFlags; requirePartitions?: boolean}
): Promise<BootstrapConfig> {
  const file = await loadConfigFile(resolve(global.config))
  return resolveConfig({
    environment,
    file,
    env: process.env,
    flags: {root: global.root, logDir: global.logDir, ...options?.flags},
    requirePartitions: options?.requirePartitions
  })
}

export function createReporter(global: GlobalOptions, options?: {verbose?: boolean}): Reporter {
  return global.json ? new ConsoleReporter() : new InteractiveReporter(options)
}
