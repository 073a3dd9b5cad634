import type {Recipe} from './types.js'

export const guix: Recipe = {
  id: 'guix',
  stepId: 'guix-build',
  archive: 'guix',
  prepare: [{
    label: 'configure',
    run: () => ['./configure', '--prefix=/usr/local', '--sysconfdir=/etc', '--localstatedir=/var']
  }],
  compile: [{label: 'make', parallel: true, run: () => ['make']}],
  install: [{label: 'install', run: ({root}) => ['make', `DESTDIR=${root}`, 'install']}]
}
