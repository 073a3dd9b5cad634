import {access, mkdir, readdir, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {InvalidStepIdError} from '../errors.js'
import type {ExecutionContext} from '../types.js'

export type StepStatus = 'done' | 'pending'

/**
 * Storage behind the state store. A key is either present or not; values
 * carry no meaning.
 */
export type PersistenceAdapter = {
  has(key: string): Promise<boolean>;
  put(key: string): Promise<void>;
  /** Returns false when the key was not present. */
  delete(key: string): Promise<boolean>;
  keys(): Promise<string[]>;
}

/**
 * One marker file per key inside a directory. The file holds the time the
 * marker was written; only its presence is read back.
 */
export class MarkerFileAdapter implements PersistenceAdapter {
  constructor(readonly directory: string) {}

  async has(key: string): Promise<boolean> {
    try {
      await access(join(this.directory, key))
      return true
    } catch {
      return false
    }
  }

  async put(key: string): Promise<void> {
    await mkdir(this.directory, {recursive: true})
    await writeFile(join(this.directory, key), new Date().toISOString() + '\n', 'utf8')
  }

  async delete(key: string): Promise<boolean> {
    if (!await this.has(key)) {
      return false
    }

    await rm(join(this.directory, key), {force: true})
    return true
  }

  async keys(): Promise<string[]> {
    try {
      const entries = await readdir(this.directory, {withFileTypes: true})
      return entries.filter(e => e.isFile()).map(e => e.name)
    } catch {
      return []
    }
  }
}

export class MemoryAdapter implements PersistenceAdapter {
  private readonly entries = new Set<string>()

  async has(key: string): Promise<boolean> {
    return this.entries.has(key)
  }

  async put(key: string): Promise<void> {
    this.entries.add(key)
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key)
  }

  async keys(): Promise<string[]> {
    return [...this.entries]
  }
}

const stepIdPattern = /^[\w.-]+$/

/**
 * Tracks which steps have completed.
 *
 * A step is `done` once `setDone()` has been called for it and stays done
 * until an operator clears it. There is no "failed" record: a failed step
 * simply stays `pending`, so the next invocation runs it again.
 *
 * Concurrent orchestrators against the same store are not coordinated.
 */
export class StateStore {
  /**
   * Creates the marker-file store for an execution context.
   * Each environment gets its own namespace under `<root>/.rootstrap/markers/`.
   */
  static forContext(context: ExecutionContext): StateStore {
    return new StateStore(new MarkerFileAdapter(StateStore.markerDir(context)))
  }

  static markerDir(context: ExecutionContext): string {
    return join(context.root, '.rootstrap', 'markers', context.environment)
  }

  constructor(private readonly adapter: PersistenceAdapter) {}

  async getStatus(stepId: string): Promise<StepStatus> {
    this.validate(stepId)
    return await this.adapter.has(stepId) ? 'done' : 'pending'
  }

  async setDone(stepId: string): Promise<void> {
    this.validate(stepId)
    await this.adapter.put(stepId)
  }

  /**
   * Removes a step's marker so the next invocation runs it again.
   * @returns false when the step had no marker
   */
  async clear(stepId: string): Promise<boolean> {
    this.validate(stepId)
    return this.adapter.delete(stepId)
  }

  /** Lists completed step IDs, sorted. */
  async list(): Promise<string[]> {
    const keys = await this.adapter.keys()
    return keys.filter(k => stepIdPattern.test(k)).sort((a, b) => a.localeCompare(b))
  }

  private validate(stepId: string): void {
    if (!stepIdPattern.test(stepId) || stepId === '.' || stepId === '..') {
      throw new InvalidStepIdError(stepId)
    }
  }
}
