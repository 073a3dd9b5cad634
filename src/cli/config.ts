import {readFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {z} from 'zod'
import {isNotFound} from '../core/utils.js'
import {ConfigurationError, InsufficientPrivilegeError, MissingSettingError} from '../errors.js'
import type {BootstrapConfig, EnvironmentKind} from '../types.js'

export const defaultConfigFile = 'rootstrap.yml'

export const defaults = {
  hostRoot: '/mnt/rootstrap',
  targetRoot: '/',
  disk: '/dev/sda',
  hostName: 'rootstrap',
  kernelVersion: '6.16.1',
  logDir: '/var/log/rootstrap',
  buildUser: 'rootstrap'
} as const

const configFileSchema = z.object({
  root: z.string().min(1).optional(),
  disk: z.string().min(1).optional(),
  partitions: z.object({
    root: z.string().min(1).optional(),
    home: z.string().min(1).optional(),
    swap: z.string().min(1).optional()
  }).strict().optional(),
  hostName: z.string().min(1).optional(),
  kernelVersion: z.string().min(1).optional(),
  logDir: z.string().min(1).optional(),
  buildUser: z.string().regex(/^[a-z_][\w-]*$/, 'must be a valid user name').optional(),
  packageManager: z.boolean().optional(),
  installKernel: z.boolean().optional()
}).strict()

export type ConfigFile = z.infer<typeof configFileSchema>

/**
 * Loads and validates a `rootstrap.yml` file.
 * A missing file yields an empty configuration unless `required` is set.
 */
export async function loadConfigFile(path: string, options?: {required?: boolean}): Promise<ConfigFile> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error: unknown) {
    if (isNotFound(error) && !options?.required) {
      return {}
    }

    throw new ConfigurationError('CONFIG_NOT_READABLE', `Cannot read configuration file ${path}`, {cause: error})
  }

  return parseConfigFile(content, path)
}

export function parseConfigFile(content: string, source = defaultConfigFile): ConfigFile {
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error: unknown) {
    throw new ConfigurationError('INVALID_CONFIG', `${source} is not valid YAML`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  const result = configFileSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigurationError('INVALID_CONFIG', `Invalid ${source}: ${issues.join('; ')}`)
  }

  return result.data
}

/** Settings given on the command line; absent ones fall through. */
export type ConfigFlags = {
  root?: string;
  logDir?: string;
  packageManager?: boolean;
  installKernel?: boolean;
}

export type ResolveConfigOptions = {
  environment: EnvironmentKind;
  file?: ConfigFile;
  env?: Record<string, string | undefined>;
  flags?: ConfigFlags;
  /** When false, missing partitions resolve to empty strings (read-only commands). */
  requirePartitions?: boolean;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value
}

function parseSwitch(value: string | undefined): boolean | undefined {
  const normalized = nonEmpty(value)?.toLowerCase()
  if (normalized === undefined) {
    return undefined
  }

  return ['1', 'true', 'yes', 'on'].includes(normalized)
}

/**
 * Resolves the configuration surface.
 * Precedence: flag, then environment variable, then file, then default.
 *
 * @throws MissingSettingError when a partition is not set anywhere
 */
export function resolveConfig(options: ResolveConfigOptions): BootstrapConfig {
  const {environment, file = {}, env = {}, flags = {}, requirePartitions = true} = options

  const partition = (setting: string, envVar: string, fromFile: string | undefined): string => {
    const value = nonEmpty(env[envVar]) ?? fromFile
    if (value === undefined) {
      if (requirePartitions) {
        throw new MissingSettingError(setting, envVar)
      }

      return ''
    }

    return value
  }

  const root = flags.root
    ?? nonEmpty(env.ROOTSTRAP_ROOT)
    ?? file.root
    ?? (environment === 'host' ? defaults.hostRoot : defaults.targetRoot)

  return {
    root: resolve(root),
    disk: nonEmpty(env.DISK) ?? file.disk ?? defaults.disk,
    rootPartition: partition('rootPartition', 'ROOT_PART', file.partitions?.root),
    homePartition: partition('homePartition', 'HOME_PART', file.partitions?.home),
    swapPartition: partition('swapPartition', 'SWAP_PART', file.partitions?.swap),
    hostName: nonEmpty(env.ROOTSTRAP_HOSTNAME) ?? file.hostName ?? defaults.hostName,
    kernelVersion: nonEmpty(env.KVER) ?? file.kernelVersion ?? defaults.kernelVersion,
    logDir: resolve(flags.logDir ?? nonEmpty(env.BUILD_LOG_DIR) ?? file.logDir ?? defaults.logDir),
    buildUser: nonEmpty(env.ROOTSTRAP_USER) ?? file.buildUser ?? defaults.buildUser,
    packageManager: flags.packageManager ?? parseSwitch(env.ROOTSTRAP_PACKAGE_MANAGER) ?? file.packageManager ?? false,
    installKernel: flags.installKernel ?? parseSwitch(env.ROOTSTRAP_INSTALL_KERNEL) ?? file.installKernel ?? false
  }
}

/**
 * @throws InsufficientPrivilegeError unless running as uid 0
 */
export function assertPrivileged(uid: number | undefined): void {
  if (uid !== 0) {
    throw new InsufficientPrivilegeError(uid)
  }
}
