import {chmod, chown, mkdir, readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {shellQuote} from '../core/utils.js'
import {BuildError} from '../errors.js'
import type {Phase} from '../types.js'
import {findPasswdEntry} from './system-files.js'

export const basePhase: Phase = {
  id: 'base',
  title: 'Base layout and build user',
  environment: 'host',
  plan: () => [{
    kind: 'step',
    id: 'setup-base',
    name: 'Create base directories and build user',
    async action(build) {
      const {paths, config} = build
      await chown(paths.root, 0, 0)
      await chmod(paths.root, 0o755)
      await mkdir(paths.sources, {recursive: true})
      await chmod(paths.sources, 0o1777)
      await mkdir(paths.tools, {recursive: true})

      const user = config.buildUser
      if (!await build.probe(['getent', 'group', user], '/')) {
        await build.exec({label: 'groupadd', cmd: ['groupadd', user], cwd: '/'})
      }

      if (!await build.probe(['id', '-u', user], '/')) {
        await build.exec({label: 'useradd', cmd: ['useradd', '-s', '/bin/bash', '-g', user, '-m', '-k', '/dev/null', user], cwd: '/'})
      }
    }
  }]
}

/** Login profile that replaces the inherited environment with a clean one. */
export function bashProfile(): string {
  return 'exec env -i HOME=$HOME TERM=$TERM PS1=\'\\u:\\w\\$ \' /bin/bash\n'
}

export type BashrcOptions = {
  root: string;
  target: string;
  jobs: number;
}

/** Non-login shell setup for building the cross toolchain. */
export function bashrc({root, target, jobs}: BashrcOptions): string {
  return [
    'set +h',
    'umask 022',
    `ROOTSTRAP=${shellQuote(root)}`,
    'LC_ALL=POSIX',
    `ROOTSTRAP_TGT=${shellQuote(target)}`,
    'PATH=/usr/bin',
    'if [ ! -L /bin ]; then PATH=/bin:$PATH; fi',
    'PATH=$ROOTSTRAP/tools/bin:$PATH',
    'CONFIG_SITE=$ROOTSTRAP/usr/share/config.site',
    'export ROOTSTRAP LC_ALL ROOTSTRAP_TGT PATH CONFIG_SITE',
    `export MAKEFLAGS=-j${jobs}`,
    ''
  ].join('\n')
}

export const profilePhase: Phase = {
  id: 'profile',
  title: 'Build user profile',
  environment: 'host',
  plan: () => [{
    kind: 'step',
    id: 'write-profile',
    name: 'Write .bash_profile and .bashrc',
    async action(build) {
      const user = build.config.buildUser
      const entry = findPasswdEntry(await readFile('/etc/passwd', 'utf8'), user)
      if (!entry) {
        throw new BuildError('USER_NOT_FOUND', `Build user "${user}" does not exist`)
      }

      const files: Array<[string, string]> = [
        ['.bash_profile', bashProfile()],
        ['.bashrc', bashrc({root: build.paths.root, target: build.target, jobs: build.jobs})]
      ]

      await mkdir(entry.home, {recursive: true})
      for (const [name, content] of files) {
        const path = join(entry.home, name)
        await writeFile(path, content, 'utf8')
        await chown(path, entry.uid, entry.gid)
      }
    }
  }]
}
