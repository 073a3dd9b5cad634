import test from 'ava'
import {access, mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {StepFailedError} from '../../errors.js'
import {BootstrapRunner} from '../../core/orchestrator.js'
import {StateStore} from '../../core/state-store.js'
import {toolchainPhase} from '../toolchain.js'
import {createTmpDir, FakeExecutor, noopReporter, testConfig, unpackArchives} from '../../__tests__/helpers.js'

test('a rerun with only binutils present skips the finished binutils step', async t => {
  const root = await createTmpDir()
  const context = {root, environment: 'host' as const}
  await mkdir(join(root, 'sources'), {recursive: true})
  await writeFile(join(root, 'sources', 'binutils-2.42.tar.xz'), '')

  const executor = new FakeExecutor(unpackArchives)
  const runner = new BootstrapRunner({
    executor,
    reporter: noopReporter,
    config: testConfig({root, logDir: join(root, 'logs')}),
    context,
    jobs: 2,
    target: 'x86_64-rootstrap-linux-gnu'
  })

  // gcc pass 1 is mandatory, so the phase stops there on both invocations
  const first = await t.throwsAsync(runner.run([toolchainPhase]), {instanceOf: StepFailedError})
  t.is(first?.stepId, 'toolchain-gcc')
  await t.notThrowsAsync(access(join(StateStore.markerDir(context), 'toolchain-binutils')))
  t.deepEqual(executor.commands.filter(cmd => cmd.startsWith('tar ')), [`tar -xf ${join(root, 'sources', 'binutils-2.42.tar.xz')}`])

  const before = executor.requests.length
  const second = await t.throwsAsync(runner.run([toolchainPhase]), {instanceOf: StepFailedError})
  t.is(second?.stepId, 'toolchain-gcc')
  t.deepEqual(executor.requests.slice(before), [])
})
