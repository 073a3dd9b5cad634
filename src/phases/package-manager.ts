import {access, chmod, mkdir, readFile, writeFile} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import {guix} from '../recipes/guix.js'
import type {BuildContext, Phase} from '../types.js'
import {recipeStep} from './steps.js'
import {findPasswdEntry, hasGroup} from './system-files.js'

export const guixBuildGroup = 'guixbuild'

/** `guixbuilder01` … `guixbuilder10`. */
export function guixBuildUsers(count = 10): string[] {
  return Array.from({length: count}, (_, i) => `guixbuilder${String(i + 1).padStart(2, '0')}`)
}

export function guixInitScript(): string {
  return `#!/bin/sh
### BEGIN INIT INFO
# Provides:          guix-daemon
# Required-Start:    $remote_fs $syslog
# Required-Stop:     $remote_fs $syslog
# Default-Start:     2 3 4 5
# Default-Stop:      0 1 6
# Short-Description: GNU Guix build daemon
### END INIT INFO
case "$1" in
  start)   /usr/local/bin/guix-daemon --build-users-group=${guixBuildGroup} & ;;
  stop)    killall guix-daemon ;;
  restart) killall guix-daemon; /usr/local/bin/guix-daemon --build-users-group=${guixBuildGroup} & ;;
  *) echo "Usage: $0 {start|stop|restart}"; exit 1 ;;
esac
exit 0
`
}

async function ensureFile(path: string, seed: string): Promise<void> {
  try {
    await access(path)
  } catch {
    await mkdir(dirname(path), {recursive: true})
    await writeFile(path, seed, 'utf8')
  }
}

async function createBuildUsers(build: BuildContext): Promise<void> {
  const {root} = build.paths
  const groupFile = join(root, 'etc', 'group')
  const passwdFile = join(root, 'etc', 'passwd')
  // shadow tools need both tables to exist under --root
  await ensureFile(groupFile, 'root:x:0:\n')
  await ensureFile(passwdFile, 'root:x:0:0:root:/root:/bin/bash\n')

  if (!hasGroup(await readFile(groupFile, 'utf8'), guixBuildGroup)) {
    await build.exec({label: 'groupadd', cmd: ['groupadd', '--root', root, '--system', guixBuildGroup], cwd: '/'})
  }

  const users = guixBuildUsers()
  for (const [index, user] of users.entries()) {
    if (findPasswdEntry(await readFile(passwdFile, 'utf8'), user)) {
      continue
    }

    await build.exec({
      label: `useradd-${user}`,
      cmd: [
        'useradd', '--root', root,
        '-g', guixBuildGroup, '-G', guixBuildGroup,
        '-d', '/var/empty', '-s', '/bin/false',
        '-c', `Guix build user ${String(index + 1).padStart(2, '0')}`,
        '--system',
        user
      ],
      cwd: '/'
    })
  }
}

/**
 * Optional GNU Guix bootstrap: builds the daemon from the sources
 * directory, installs it into the target root and prepares its build users.
 */
export const packageManagerPhase: Phase = {
  id: 'package-manager',
  title: 'GNU Guix',
  environment: 'host',
  enabled: config => config.packageManager,
  plan: () => [
    recipeStep(guix, 'GNU Guix'),
    {
      kind: 'step',
      id: 'guix-users',
      name: 'Create Guix build users',
      action: createBuildUsers
    },
    {
      kind: 'step',
      id: 'guix-init-script',
      name: 'Write guix-daemon init script',
      async action(build) {
        const path = join(build.paths.root, 'etc', 'init.d', 'guix-daemon')
        await mkdir(dirname(path), {recursive: true})
        await writeFile(path, guixInitScript(), 'utf8')
        await chmod(path, 0o755)
      }
    }
  ]
}
