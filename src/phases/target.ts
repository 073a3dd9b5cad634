import {copyFile, mkdir, stat, writeFile} from 'node:fs/promises'
import {machine} from 'node:os'
import {join} from 'node:path'
import {archiveStem} from '../core/archive-resolver.js'
import {SourceTreeError} from '../errors.js'
import {createPackageRegistry, packageIds, type PackageId} from '../recipes/packages.js'
import type {RecipeRegistry} from '../recipes/registry.js'
import type {BootstrapConfig, Phase, PlanEntry} from '../types.js'
import {recipeStep} from './steps.js'
import {partitionNumber} from './system-files.js'

export function packagesPhase(registry: RecipeRegistry<PackageId> = createPackageRegistry()): Phase {
  return {
    id: 'packages',
    title: 'Target-root packages',
    environment: 'target-root',
    plan: () => packageIds.map((name): PlanEntry => {
      const dispatch = registry.dispatch(name)
      return dispatch.kind === 'recipe'
        ? recipeStep(dispatch.recipe, name)
        : {kind: 'unsupported', name: dispatch.name}
    })
  }
}

export function hostsFile(hostName: string): string {
  return `127.0.0.1 localhost\n127.0.1.1 ${hostName}\n`
}

export const hostsPhase: Phase = {
  id: 'hosts',
  title: 'Host name resolution',
  environment: 'target-root',
  plan: () => [{
    kind: 'step',
    id: 'write-hosts',
    name: 'Write /etc/hosts',
    async action(build) {
      const etc = join(build.paths.root, 'etc')
      await mkdir(etc, {recursive: true})
      await writeFile(join(etc, 'hosts'), hostsFile(build.config.hostName), 'utf8')
      await writeFile(join(etc, 'hostname'), `${build.config.hostName}\n`, 'utf8')
    }
  }]
}

/** Location of the bootable image inside a built kernel tree. */
export function kernelImagePath(arch: string): string {
  switch (arch) {
    case 'x86_64':
    case 'i686':
    case 'i386': {
      return join('arch', 'x86', 'boot', 'bzImage')
    }

    case 'aarch64': {
      return join('arch', 'arm64', 'boot', 'Image')
    }

    default: {
      return join('arch', arch, 'boot', 'bzImage')
    }
  }
}

export function kernelFileName(kernelVersion: string): string {
  return `vmlinuz-${kernelVersion}-rootstrap`
}

export function grubConfig(config: Pick<BootstrapConfig, 'kernelVersion' | 'rootPartition'>): string {
  return [
    'set default=0',
    'set timeout=5',
    '',
    'insmod ext2',
    `set root=(hd0,${partitionNumber(config.rootPartition)})`,
    '',
    `menuentry "rootstrap (${config.kernelVersion})" {`,
    `  linux /boot/${kernelFileName(config.kernelVersion)} root=${config.rootPartition} ro`,
    '}',
    ''
  ].join('\n')
}

/**
 * Installs the kernel built by the `linux-build` step: copies the image,
 * System.map and config into /boot, installs GRUB on the configured disk and
 * writes its menu.
 */
export const kernelPhase: Phase = {
  id: 'kernel',
  title: 'Kernel and boot loader',
  environment: 'target-root',
  enabled: config => config.installKernel,
  plan: () => [{
    kind: 'step',
    id: 'kernel-install',
    name: 'Install kernel and GRUB',
    async action(build) {
      const {config, paths} = build
      const kernelTree = join(paths.work, archiveStem(await build.archives.require('linux')))
      try {
        await stat(join(kernelTree, '.config'))
      } catch (error) {
        throw new SourceTreeError(`No configured kernel tree at ${kernelTree}, the linux-build step must run first`, {cause: error})
      }

      const boot = join(paths.root, 'boot')
      await mkdir(join(boot, 'grub'), {recursive: true})
      await copyFile(join(kernelTree, kernelImagePath(machine())), join(boot, kernelFileName(config.kernelVersion)))
      await copyFile(join(kernelTree, 'System.map'), join(boot, `System.map-${config.kernelVersion}`))
      await copyFile(join(kernelTree, '.config'), join(boot, `config-${config.kernelVersion}`))

      await build.exec({label: 'grub-install', cmd: ['grub-install', config.disk], cwd: paths.root})
      await writeFile(join(boot, 'grub', 'grub.cfg'), grubConfig(config), 'utf8')
    }
  }]
}
