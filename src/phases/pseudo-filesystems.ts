import {chmod, lstat, mkdir, realpath} from 'node:fs/promises'
import {join} from 'node:path'
import {isNotFound} from '../core/utils.js'
import type {BuildContext, Phase} from '../types.js'

export type PseudoMount = {
  label: string;
  target: string;
  cmd: string[];
}

/** Kernel virtual filesystems the target root needs, in mount order. */
export function pseudoMounts(root: string): PseudoMount[] {
  const at = (...segments: string[]) => join(root, ...segments)
  return [
    {label: 'mount-dev', target: at('dev'), cmd: ['mount', '-v', '--bind', '/dev', at('dev')]},
    {label: 'mount-devpts', target: at('dev', 'pts'), cmd: ['mount', '-v', '-t', 'devpts', 'devpts', '-o', 'gid=5,mode=0620', at('dev', 'pts')]},
    {label: 'mount-proc', target: at('proc'), cmd: ['mount', '-v', '-t', 'proc', 'proc', at('proc')]},
    {label: 'mount-sysfs', target: at('sys'), cmd: ['mount', '-v', '-t', 'sysfs', 'sysfs', at('sys')]},
    {label: 'mount-run', target: at('run'), cmd: ['mount', '-v', '-t', 'tmpfs', 'tmpfs', at('run')]}
  ]
}

async function isMounted(build: BuildContext, target: string): Promise<boolean> {
  return build.probe(['mountpoint', '-q', target], '/')
}

async function isSymbolicLink(path: string): Promise<boolean> {
  try {
    const stats = await lstat(path)
    return stats.isSymbolicLink()
  } catch (error) {
    if (isNotFound(error)) {
      return false
    }

    throw error
  }
}

async function setupShm(build: BuildContext): Promise<void> {
  const shm = join(build.paths.root, 'dev', 'shm')
  if (await isSymbolicLink(shm)) {
    const target = join(build.paths.root, await realpath('/dev/shm'))
    await mkdir(target, {recursive: true})
    await chmod(target, 0o1777)
    return
  }

  if (await isMounted(build, shm)) {
    return
  }

  await build.exec({
    label: 'mount-shm',
    cmd: ['mount', '-v', '-t', 'tmpfs', '-o', 'nosuid,nodev', 'tmpfs', shm],
    cwd: '/',
    optional: true
  })
}

/**
 * Mounts are not persistent: after a reboot the step's marker survives but
 * the mounts do not, so the operator clears `mount-pseudos` before resuming.
 */
export const pseudoFilesystemsPhase: Phase = {
  id: 'pseudo-filesystems',
  title: 'Mount pseudo-filesystems',
  environment: 'host',
  plan: () => [{
    kind: 'step',
    id: 'mount-pseudos',
    name: 'Mount /dev, /proc, /sys and /run',
    async action(build) {
      for (const mount of pseudoMounts(build.paths.root)) {
        await mkdir(mount.target, {recursive: true})
        if (await isMounted(build, mount.target)) {
          continue
        }

        await build.exec({label: mount.label, cmd: mount.cmd, cwd: '/'})
      }

      await setupShm(build)
    }
  }]
}
