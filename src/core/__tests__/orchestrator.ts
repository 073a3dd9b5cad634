import test from 'ava'
import {join} from 'node:path'
import {OrchestrationError, StepFailedError} from '../../errors.js'
import type {Phase, PlanEntry} from '../../types.js'
import {BootstrapRunner} from '../orchestrator.js'
import {MemoryAdapter, StateStore} from '../state-store.js'
import {createTmpDir, FakeExecutor, recordingReporter, testConfig} from '../../__tests__/helpers.js'

type Fixture = Awaited<ReturnType<typeof setup>>

async function setup(options?: {packageManager?: boolean}) {
  const root = await createTmpDir()
  const config = testConfig({root, logDir: join(root, 'logs'), packageManager: options?.packageManager ?? false})
  const store = new StateStore(new MemoryAdapter())
  const {reporter, events} = recordingReporter()
  const failing = new Set<string>()
  const executor = new FakeExecutor(request => ({
    exitCode: failing.has(request.cmd.join(' ')) ? 2 : 0,
    stdout: [`ran ${request.cmd.join(' ')}`]
  }))
  const runner = new BootstrapRunner({
    executor,
    reporter,
    config,
    store,
    context: {root, environment: 'host'},
    jobs: 2,
    target: 'x86_64-rootstrap-linux-gnu'
  })
  const calls: string[] = []
  return {root, config, store, events, failing, executor, runner, calls}
}

/** A step whose action runs `make <id>` through the logged exec. */
function step(f: Fixture, id: string): PlanEntry {
  return {
    kind: 'step',
    id,
    async action(build) {
      f.calls.push(id)
      await build.exec({label: 'make', cmd: ['make', id], cwd: build.paths.root})
    }
  }
}

function phase(id: string, entries: PlanEntry[], extra?: Partial<Phase>): Phase {
  return {id, title: `Phase ${id}`, environment: 'host', plan: () => entries, ...extra}
}

function phases(f: Fixture): Phase[] {
  return [
    phase('a', [step(f, 'a1'), step(f, 'a2')]),
    phase('b', [step(f, 'b1')])
  ]
}

test('runs phases and steps in order', async t => {
  const f = await setup()
  const reports = await f.runner.run(phases(f))

  t.deepEqual(f.calls, ['a1', 'a2', 'b1'])
  t.deepEqual(reports.map(r => [r.id, r.state]), [['a', 'done'], ['b', 'done']])
  t.deepEqual(await f.store.list(), ['a1', 'a2', 'b1'])
  t.deepEqual(f.events.filter(e => e.event !== 'STEP_LOG').map(e => e.event), [
    'RUN_START',
    'PHASE_START',
    'STEP_STARTING',
    'STEP_FINISHED',
    'STEP_STARTING',
    'STEP_FINISHED',
    'PHASE_FINISHED',
    'PHASE_START',
    'STEP_STARTING',
    'STEP_FINISHED',
    'PHASE_FINISHED',
    'RUN_FINISHED'
  ])
})

test('checks for tar before a real run', async t => {
  const f = await setup()
  await f.runner.run(phases(f))
  t.deepEqual(f.executor.checked, [['tar']])
})

test('a second run invokes no action', async t => {
  const f = await setup()
  await f.runner.run(phases(f))
  f.calls.length = 0
  f.events.length = 0
  const commandsBefore = f.executor.requests.length

  const reports = await f.runner.run(phases(f))
  t.deepEqual(f.calls, [])
  t.is(f.executor.requests.length, commandsBefore)
  t.is(f.events.filter(e => e.event === 'STEP_SKIPPED').length, 3)
  t.deepEqual(reports.map(r => r.state), ['done', 'done'])
})

test('a failing step halts the run and names step, phase and log', async t => {
  const f = await setup()
  f.failing.add('make a2')

  const error = await t.throwsAsync(f.runner.run(phases(f)), {instanceOf: StepFailedError})
  t.is(error?.stepId, 'a2')
  t.is(error?.phaseId, 'a')
  t.is(error?.logPath, join(f.config.logDir, 'a2-make.log'))
  t.deepEqual(f.calls, ['a1', 'a2'])
  t.deepEqual([...f.runner.phaseStates], [['a', 'failed'], ['b', 'pending']])
  t.is(await f.store.getStatus('a1'), 'done')
  t.is(await f.store.getStatus('a2'), 'pending')
  t.deepEqual(f.events.slice(-3).map(e => e.event), ['STEP_FAILED', 'PHASE_FAILED', 'RUN_FAILED'])
})

test('resumes at the first incomplete step', async t => {
  const f = await setup()
  f.failing.add('make a2')
  await t.throwsAsync(f.runner.run(phases(f)), {instanceOf: StepFailedError})

  f.failing.clear()
  f.calls.length = 0
  await f.runner.run(phases(f))
  t.deepEqual(f.calls, ['a2', 'b1'])
})

test('forwards action output as STEP_LOG events', async t => {
  const f = await setup()
  await f.runner.run([phase('a', [step(f, 'a1')])])
  const logs = f.events.filter(e => e.event === 'STEP_LOG')
  t.is(logs.length, 1)
  t.like(logs[0], {event: 'STEP_LOG', stream: 'stdout', line: 'ran make a1', step: {id: 'a1', phaseId: 'a'}})
})

test('unsupported packages are reported and skipped', async t => {
  const f = await setup()
  await f.runner.run([phase('packages', [step(f, 'bash'), {kind: 'unsupported', name: 'perl'}, step(f, 'gcc-final')])])

  t.deepEqual(f.calls, ['bash', 'gcc-final'])
  const unsupported = f.events.filter(e => e.event === 'PACKAGE_UNSUPPORTED')
  t.is(unsupported.length, 1)
  t.like(unsupported[0], {environment: 'host', phaseId: 'packages', name: 'perl'})
})

test('a disabled optional phase is skipped and stays pending', async t => {
  const f = await setup()
  const optional = phase('package-manager', [step(f, 'guix-build')], {enabled: config => config.packageManager})
  const reports = await f.runner.run([...phases(f), optional])

  t.deepEqual(f.calls, ['a1', 'a2', 'b1'])
  t.is(reports.at(-1)?.state, 'pending')
  t.is(reports.at(-1)?.enabled, false)
  t.true(f.events.some(e => e.event === 'PHASE_SKIPPED' && e.phaseId === 'package-manager'))
})

test('an enabled optional phase runs', async t => {
  const f = await setup({packageManager: true})
  const optional = phase('package-manager', [step(f, 'guix-build')], {enabled: config => config.packageManager})
  await f.runner.run([...phases(f), optional])
  t.deepEqual(f.calls, ['a1', 'a2', 'b1', 'guix-build'])
})

test('dry run invokes nothing and writes no marker', async t => {
  const f = await setup()
  await f.store.setDone('a1')

  const reports = await f.runner.run(phases(f), {dryRun: true})
  t.deepEqual(f.calls, [])
  t.deepEqual(f.executor.checked, [])
  t.deepEqual(await f.store.list(), ['a1'])
  t.deepEqual(f.events.filter(e => e.event === 'STEP_SKIPPED' || e.event === 'STEP_WOULD_RUN').map(e => e.event), [
    'STEP_SKIPPED',
    'STEP_WOULD_RUN',
    'STEP_WOULD_RUN'
  ])
  t.deepEqual(reports.map(r => r.state), ['pending', 'pending'])
})

test('status derives the state vector from markers', async t => {
  const f = await setup()
  await f.store.setDone('a1')
  await f.store.setDone('a2')

  const reports = await f.runner.status([
    ...phases(f),
    phase('c', [{kind: 'unsupported', name: 'perl'}])
  ])
  t.deepEqual(reports, [
    {id: 'a', title: 'Phase a', enabled: true, state: 'done', steps: [{id: 'a1', status: 'done'}, {id: 'a2', status: 'done'}], unsupported: []},
    {id: 'b', title: 'Phase b', enabled: true, state: 'pending', steps: [{id: 'b1', status: 'pending'}], unsupported: []},
    {id: 'c', title: 'Phase c', enabled: true, state: 'done', steps: [], unsupported: ['perl']}
  ])
})

test('rejects phases of the other environment', async t => {
  const f = await setup()
  const foreign = phase('packages', [step(f, 'bash')], {environment: 'target-root'})
  const error = await t.throwsAsync(f.runner.run([foreign]), {instanceOf: OrchestrationError})
  t.is(error?.code, 'ENVIRONMENT_MISMATCH')
  t.deepEqual(f.calls, [])
})

test('rejects a step ID planned twice', async t => {
  const f = await setup()
  const error = await t.throwsAsync(f.runner.run([phase('a', [step(f, 'x')]), phase('b', [step(f, 'x')])]), {instanceOf: OrchestrationError})
  t.is(error?.code, 'DUPLICATE_STEP')
})
