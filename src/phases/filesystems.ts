import {mkdir, readFile} from 'node:fs/promises'
import {join} from 'node:path'
import type {BuildContext, Phase} from '../types.js'
import {activeSwaps} from './system-files.js'

async function formatIfBlank(build: BuildContext, label: string, partition: string): Promise<void> {
  if (await build.probe(['blkid', partition], '/')) {
    return
  }

  await build.exec({label: `mkfs-${label}`, cmd: ['mkfs', '-v', '-t', 'ext4', partition], cwd: '/'})
}

async function mountIfNeeded(build: BuildContext, label: string, partition: string, target: string): Promise<void> {
  await mkdir(target, {recursive: true})
  if (await build.probe(['mountpoint', '-q', target], '/')) {
    return
  }

  await build.exec({label: `mount-${label}`, cmd: ['mount', '-v', '-t', 'ext4', partition, target], cwd: '/'})
}

async function enableSwap(build: BuildContext, partition: string): Promise<void> {
  const swaps = await readFile('/proc/swaps', 'utf8')
  if (activeSwaps(swaps).includes(partition)) {
    return
  }

  await build.exec({label: 'mkswap', cmd: ['mkswap', partition], cwd: '/'})
  await build.exec({label: 'swapon', cmd: ['swapon', partition], cwd: '/'})
}

/**
 * Formats the root and home partitions when they carry no filesystem,
 * activates swap and mounts both under the target root. Partitions that are
 * already formatted or mounted are left as they are.
 */
export const filesystemsPhase: Phase = {
  id: 'filesystems',
  title: 'Prepare filesystems',
  environment: 'host',
  plan: () => [{
    kind: 'step',
    id: 'prepare-fs',
    name: 'Format and mount partitions',
    async action(build) {
      const {config, paths} = build
      await formatIfBlank(build, 'root', config.rootPartition)
      await formatIfBlank(build, 'home', config.homePartition)
      await enableSwap(build, config.swapPartition)
      await mountIfNeeded(build, 'root', config.rootPartition, paths.root)
      await mountIfNeeded(build, 'home', config.homePartition, join(paths.root, 'home'))
    }
  }]
}
