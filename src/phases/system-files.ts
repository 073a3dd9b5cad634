// Parsers for the few system tables the phases consult before acting.

export type PasswdEntry = {
  name: string;
  uid: number;
  gid: number;
  home: string;
  shell: string;
}

/** Finds a user in `/etc/passwd` content. */
export function findPasswdEntry(content: string, name: string): PasswdEntry | undefined {
  for (const line of content.split('\n')) {
    const fields = line.split(':')
    if (fields.length < 7 || fields[0] !== name) {
      continue
    }

    const [, , uid, gid, , home, shell] = fields
    return {name, uid: Number(uid), gid: Number(gid), home: home ?? '', shell: shell ?? ''}
  }

  return undefined
}

/** Whether `/etc/group` content declares the group. */
export function hasGroup(content: string, name: string): boolean {
  return content.split('\n').some(line => line.startsWith(`${name}:`))
}

/** Devices listed as active in `/proc/swaps` content. */
export function activeSwaps(content: string): string[] {
  return content
    .split('\n')
    .slice(1)
    .map(line => line.trim().split(/\s+/)[0] ?? '')
    .filter(device => device.length > 0)
}

/**
 * Trailing partition number of a device path (`/dev/sda2` → 2,
 * `/dev/nvme0n1p3` → 3). Defaults to 1 for whole-disk devices.
 */
export function partitionNumber(device: string): number {
  const match = /(\d+)$/.exec(device)
  if (!match || /^\/dev\/nvme\d+n\d+$/.test(device)) {
    return 1
  }

  return Number(match[1])
}
