import type {Dirent} from 'node:fs'
import {readdir, stat} from 'node:fs/promises'
import {basename, join} from 'node:path'
import {ArchiveNotFoundError} from '../errors.js'
import {isNotFound} from './utils.js'

/** Archive formats in resolution priority order. */
export const archiveSuffixes = ['tar.xz', 'tar.gz', 'tar.bz2', 'tar.lz', 'tar.zst', 'tar'] as const

export type ArchiveSuffix = typeof archiveSuffixes[number]

export type ArchiveResolution =
  | {found: true; path: string; suffix: ArchiveSuffix}
  | {found: false; name: string}

const versionSeparator = '-'

/**
 * Locates versioned source archives (`name-version.suffix`) in a flat
 * sources directory without hardcoding versions.
 *
 * Resolution is deterministic: suffixes are tried in `archiveSuffixes`
 * order and, within one suffix, candidates are compared by file name. The
 * directory listing order and file timestamps never matter.
 */
export class ArchiveResolver {
  constructor(readonly sourcesDir: string) {}

  /**
   * @param name - Logical package name, with or without the trailing `-`
   */
  async resolve(name: string): Promise<ArchiveResolution> {
    const prefix = name.endsWith(versionSeparator) ? name : name + versionSeparator
    const files = await this.listFiles()

    for (const suffix of archiveSuffixes) {
      const extension = `.${suffix}`
      const candidates = files
        .filter(file => file.startsWith(prefix) && file.endsWith(extension))
        .filter(file => /^\d/.test(file.slice(prefix.length)))
        .sort((a, b) => a.localeCompare(b, 'en'))
      const [first] = candidates
      if (first) {
        return {found: true, path: join(this.sourcesDir, first), suffix}
      }
    }

    return {found: false, name: prefix.slice(0, -versionSeparator.length)}
  }

  /**
   * Like resolve(), for archives a step cannot do without.
   * @throws ArchiveNotFoundError when no archive matches
   */
  async require(name: string): Promise<string> {
    const resolution = await this.resolve(name)
    if (!resolution.found) {
      throw new ArchiveNotFoundError(resolution.name, this.sourcesDir)
    }

    return resolution.path
  }

  /** Regular files, including symlinks that point at one. */
  private async listFiles(): Promise<string[]> {
    let entries: Dirent[]
    try {
      entries = await readdir(this.sourcesDir, {withFileTypes: true})
    } catch (error) {
      if (isNotFound(error)) {
        return []
      }

      throw error
    }

    const files: string[] = []
    for (const entry of entries) {
      if (entry.isFile() || (entry.isSymbolicLink() && await this.isLinkedFile(entry.name))) {
        files.push(entry.name)
      }
    }

    return files
  }

  private async isLinkedFile(name: string): Promise<boolean> {
    try {
      const stats = await stat(join(this.sourcesDir, name))
      return stats.isFile()
    } catch (error) {
      if (isNotFound(error)) {
        return false
      }

      throw error
    }
  }
}

/**
 * Strips the archive suffix, giving the top-level directory the archive
 * is expected to unpack into (`binutils-2.42.tar.xz` → `binutils-2.42`).
 */
export function archiveStem(archivePath: string): string {
  const name = basename(archivePath)
  for (const suffix of archiveSuffixes) {
    if (name.endsWith(`.${suffix}`)) {
      return name.slice(0, -(suffix.length + 1))
    }
  }

  return name
}
