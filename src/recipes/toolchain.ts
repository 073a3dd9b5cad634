import {join} from 'node:path'
import type {Recipe} from './types.js'

// Cross toolchain built on the host into <root>/tools, ahead of the target root.

export const binutilsPass1: Recipe = {
  id: 'binutils-pass1',
  stepId: 'toolchain-binutils',
  archive: 'binutils',
  separateBuildDir: true,
  prepare: [{
    label: 'configure',
    run: ({root, target}) => [
      '../configure',
      `--prefix=${join(root, 'tools')}`,
      `--with-sysroot=${root}`,
      `--target=${target}`,
      '--enable-gold',
      '--enable-ld=default',
      '--enable-plugins',
      '--disable-nls',
      '--disable-werror'
    ]
  }],
  compile: [{label: 'make', parallel: true, run: () => ['make']}],
  install: [{label: 'install', run: () => ['make', 'install']}]
}

export const gccPass1: Recipe = {
  id: 'gcc-pass1',
  stepId: 'toolchain-gcc',
  archive: 'gcc',
  bundles: [
    {archive: 'mpfr', as: 'mpfr', optional: true},
    {archive: 'gmp', as: 'gmp', optional: true},
    {archive: 'mpc', as: 'mpc', optional: true}
  ],
  separateBuildDir: true,
  prepare: [
    {label: 'prerequisites', cwd: 'source', optional: true, run: () => ['./contrib/download_prerequisites']},
    {
      label: 'configure',
      run: ({root, target}) => [
        '../configure',
        `--target=${target}`,
        `--prefix=${join(root, 'tools')}`,
        `--with-sysroot=${root}`,
        '--disable-nls',
        '--disable-multilib',
        '--enable-languages=c,c++',
        '--without-headers'
      ]
    }
  ],
  compile: [
    {label: 'make-gcc', parallel: true, run: () => ['make', 'all-gcc']},
    {label: 'make-libgcc', parallel: true, run: () => ['make', 'all-target-libgcc']}
  ],
  install: [
    {label: 'install-gcc', run: () => ['make', 'install-gcc']},
    {label: 'install-libgcc', run: () => ['make', 'install-target-libgcc']}
  ]
}

export const linuxHeaders: Recipe = {
  id: 'linux-headers',
  stepId: 'toolchain-linux-headers',
  archive: 'linux',
  optional: true,
  prepare: [{label: 'mrproper', run: () => ['make', 'mrproper']}],
  compile: [],
  install: [{
    label: 'install',
    run: ({root}) => ['make', 'headers_install', `INSTALL_HDR_PATH=${join(root, 'usr')}`]
  }]
}

export const glibc: Recipe = {
  id: 'glibc',
  stepId: 'toolchain-glibc',
  archive: 'glibc',
  optional: true,
  separateBuildDir: true,
  prepare: [{
    label: 'configure',
    // --build comes from the tree's own config.guess
    run: ({target}) => [
      'sh',
      '-c',
      `../configure --prefix=/usr --host=${target} --build="$(../scripts/config.guess)" --disable-profile --enable-kernel=4.19`
    ]
  }],
  compile: [{label: 'make', parallel: true, run: () => ['make']}],
  install: [{label: 'install', run: ({root}) => ['make', `DESTDIR=${root}`, 'install']}]
}

/** Compiler steps, in build order, after the binutils pass. */
export const compilerRecipes: readonly Recipe[] = [gccPass1, linuxHeaders, glibc]
