import {chmod, mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {shellQuote} from '../core/utils.js'
import type {BootstrapConfig, Phase} from '../types.js'

/** Paths of the generated scripts, relative to the target root. */
export const continuationScriptPath = '/root/rootstrap-target-root.sh'
export const enterScriptPath = '/root/enter-target-root.sh'

/**
 * Configuration exported to the target-root invocation. The root becomes `/`
 * because the continuation runs after the filesystem root has changed.
 */
export function continuationEnv(config: BootstrapConfig): Array<[string, string]> {
  return [
    ['ROOTSTRAP_ROOT', '/'],
    ['DISK', config.disk],
    ['ROOT_PART', config.rootPartition],
    ['HOME_PART', config.homePartition],
    ['SWAP_PART', config.swapPartition],
    ['ROOTSTRAP_HOSTNAME', config.hostName],
    ['KVER', config.kernelVersion],
    ['BUILD_LOG_DIR', config.logDir],
    ['ROOTSTRAP_USER', config.buildUser]
  ]
}

export function continuationScript(config: BootstrapConfig): string {
  const args = ['run', '--environment', 'target-root']
  if (config.installKernel) {
    args.push('--install-kernel')
  }

  return [
    '#!/bin/sh',
    '# Continues the bootstrap inside the target root.',
    'set -eu',
    ...continuationEnv(config).map(([name, value]) => `export ${name}=${shellQuote(value)}`),
    `exec rootstrap ${args.join(' ')} "$@"`,
    ''
  ].join('\n')
}

export function enterScript(root: string): string {
  return [
    '#!/bin/sh',
    '# Enters the target root with a clean login environment.',
    'set -eu',
    `exec chroot ${shellQuote(root)} /usr/bin/env -i \\`,
    '  HOME=/root \\',
    '  TERM="${TERM:-linux}" \\',
    '  PS1=\'(rootstrap) \\u:\\w\\$ \' \\',
    '  PATH=/usr/bin:/usr/sbin:/bin:/sbin \\',
    '  /bin/bash --login',
    ''
  ].join('\n')
}

async function writeExecutable(path: string, content: string): Promise<void> {
  await writeFile(path, content, 'utf8')
  await chmod(path, 0o755)
}

export const transitionPhase: Phase = {
  id: 'transition',
  title: 'Target-root handover',
  environment: 'host',
  plan: () => [{
    kind: 'step',
    id: 'transition-scripts',
    name: 'Write target-root scripts',
    async action(build) {
      const {root} = build.paths
      await mkdir(join(root, 'root'), {recursive: true})
      await writeExecutable(join(root, continuationScriptPath), continuationScript(build.config))
      await writeExecutable(join(root, enterScriptPath), enterScript(root))
    }
  }]
}
