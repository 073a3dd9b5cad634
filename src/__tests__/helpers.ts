import {mkdir, mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {archiveStem} from '../core/archive-resolver.js'
import type {BootstrapEvent, Reporter} from '../core/reporter.js'
import {ActionExecutor, type ActionRequest, type ActionResult, type OnLogLine} from '../engine/index.js'
import type {BootstrapConfig} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'rootstrap-test-'))
}

/**
 * Silent reporter.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records emitted events for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: BootstrapEvent[]} {
  const events: BootstrapEvent[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    }
  }

  return {reporter, events}
}

export type FakeResponse = {
  exitCode?: number;
  stdout?: string[];
  stderr?: string[];
}

export type FakeHandler = (request: ActionRequest) => FakeResponse | undefined | Promise<FakeResponse | undefined>

/**
 * In-process executor: records every request and answers through an
 * optional handler (exit 0 with no output by default).
 */
export class FakeExecutor extends ActionExecutor {
  readonly requests: ActionRequest[] = []
  readonly checked: string[][] = []

  constructor(private readonly handler?: FakeHandler) {
    super()
  }

  /** Commands run so far, joined with spaces. */
  get commands(): string[] {
    return this.requests.map(r => r.cmd.join(' '))
  }

  async check(tools: string[]): Promise<void> {
    this.checked.push(tools)
  }

  async run(request: ActionRequest, onLogLine: OnLogLine): Promise<ActionResult> {
    this.requests.push(request)
    const startedAt = new Date()
    const response = await this.handler?.(request) ?? {}

    for (const line of response.stdout ?? []) {
      onLogLine({stream: 'stdout', line})
    }

    for (const line of response.stderr ?? []) {
      onLogLine({stream: 'stderr', line})
    }

    return {exitCode: response.exitCode ?? 0, startedAt, finishedAt: new Date()}
  }
}

/**
 * Handler that mimics `tar -xf <archive>` by creating the top-level directory
 * the archive would unpack into.
 */
export async function unpackArchives(request: ActionRequest): Promise<FakeResponse | undefined> {
  const [tool, , archive] = request.cmd
  if (tool === 'tar' && archive) {
    await mkdir(join(request.cwd, archiveStem(archive)), {recursive: true})
  }

  return undefined
}

export function testConfig(overrides?: Partial<BootstrapConfig>): BootstrapConfig {
  return {
    root: '/mnt/test-root',
    disk: '/dev/sdz',
    rootPartition: '/dev/sdz2',
    homePartition: '/dev/sdz3',
    swapPartition: '/dev/sdz1',
    hostName: 'testhost',
    kernelVersion: '6.1.0',
    logDir: '/tmp/test-logs',
    buildUser: 'builder',
    packageManager: false,
    installKernel: false,
    ...overrides
  }
}
