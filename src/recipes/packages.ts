import {RecipeRegistry} from './registry.js'
import type {Recipe, RecipeAction} from './types.js'

/** Packages built inside the target root, in build order. */
export const packageIds = [
  'bzip2',
  'coreutils',
  'diffutils',
  'findutils',
  'gawk',
  'grep',
  'gzip',
  'make',
  'patch',
  'tar',
  'xz',
  'binutils',
  'gcc',
  'linux',
  'util-linux',
  'e2fsprogs',
  'shadow',
  'sysklogd',
  'procps-ng',
  'man-db',
  'perl',
  'python3',
  'bash'
] as const

export type PackageId = typeof packageIds[number]

function configure(...flags: string[]): RecipeAction {
  return {label: 'configure', run: () => ['./configure', ...flags]}
}

function configureOutOfTree(...flags: string[]): RecipeAction {
  return {label: 'configure', run: () => ['../configure', ...flags]}
}

const make: RecipeAction = {label: 'make', parallel: true, run: () => ['make']}
const makeInstall: RecipeAction = {label: 'install', run: () => ['make', 'install']}

export const bzip2: Recipe<PackageId> = {
  id: 'bzip2',
  archive: 'bzip2',
  compile: [
    {label: 'make-shared', run: () => ['make', '-f', 'Makefile-libbz2_so']},
    {label: 'clean', run: () => ['make', 'clean']}
  ],
  install: [{label: 'install', run: () => ['make', 'PREFIX=/usr', 'install']}]
}

export const coreutils: Recipe<PackageId> = {
  id: 'coreutils',
  archive: 'coreutils',
  prepare: [{
    ...configure('--prefix=/usr', '--enable-no-install-program=kill,uptime'),
    // configure refuses to run as root otherwise
    env: {FORCE_UNSAFE_CONFIGURE: '1'}
  }],
  compile: [make],
  install: [makeInstall]
}

export const gnuMake: Recipe<PackageId> = {
  id: 'make',
  archive: 'make',
  prepare: [configure('--prefix=/usr')],
  compile: [make],
  install: [makeInstall]
}

export const gcc: Recipe<PackageId> = {
  id: 'gcc',
  stepId: 'gcc-final',
  archive: 'gcc',
  separateBuildDir: true,
  prepare: [
    {label: 'prerequisites', cwd: 'source', optional: true, run: () => ['./contrib/download_prerequisites']},
    configureOutOfTree(
      '--prefix=/usr',
      '--enable-languages=c,c++',
      '--disable-multilib',
      '--disable-bootstrap',
      '--with-system-zlib'
    )
  ],
  compile: [make],
  install: [makeInstall]
}

export const linux: Recipe<PackageId> = {
  id: 'linux',
  stepId: 'linux-build',
  archive: 'linux',
  prepare: [
    {label: 'mrproper', run: () => ['make', 'mrproper']},
    {label: 'defconfig', run: () => ['make', 'defconfig']}
  ],
  compile: [make],
  install: [{label: 'modules-install', run: ({root}) => ['make', 'modules_install', `INSTALL_MOD_PATH=${root}`]}]
}

export const utilLinux: Recipe<PackageId> = {
  id: 'util-linux',
  archive: 'util-linux',
  prepare: [configure('--prefix=/usr', '--sysconfdir=/etc', '--with-rootlibdir=/lib')],
  compile: [make],
  install: [makeInstall]
}

export const e2fsprogs: Recipe<PackageId> = {
  id: 'e2fsprogs',
  archive: 'e2fsprogs',
  separateBuildDir: true,
  prepare: [configureOutOfTree('--prefix=/usr', '--enable-elf-shlibs')],
  compile: [make],
  install: [makeInstall]
}

export const bash: Recipe<PackageId> = {
  id: 'bash',
  archive: 'bash',
  prepare: [configure('--prefix=/usr', '--without-bash-malloc')],
  compile: [make],
  install: [makeInstall]
}

export const builtinRecipes: ReadonlyArray<Recipe<PackageId>> = [
  bzip2,
  coreutils,
  gnuMake,
  gcc,
  linux,
  utilLinux,
  e2fsprogs,
  bash
]

export function createPackageRegistry(): RecipeRegistry<PackageId> {
  const registry = new RecipeRegistry<PackageId>(packageIds)
  for (const recipe of builtinRecipes) {
    registry.register(recipe)
  }

  return registry
}
