import test from 'ava'
import {readdir, readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {InvalidStepIdError} from '../../errors.js'
import {MarkerFileAdapter, MemoryAdapter, StateStore} from '../state-store.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('unknown step is pending', async t => {
  const store = new StateStore(new MemoryAdapter())
  t.is(await store.getStatus('prepare-fs'), 'pending')
})

test('setDone makes a step done', async t => {
  const store = new StateStore(new MemoryAdapter())
  await store.setDone('prepare-fs')
  t.is(await store.getStatus('prepare-fs'), 'done')
})

test('clear reports whether a marker existed', async t => {
  const store = new StateStore(new MemoryAdapter())
  await store.setDone('mount-pseudos')
  t.true(await store.clear('mount-pseudos'))
  t.false(await store.clear('mount-pseudos'))
  t.is(await store.getStatus('mount-pseudos'), 'pending')
})

test('list is sorted', async t => {
  const store = new StateStore(new MemoryAdapter())
  await store.setDone('setup-base')
  await store.setDone('prepare-fs')
  await store.setDone('mount-pseudos')
  t.deepEqual(await store.list(), ['mount-pseudos', 'prepare-fs', 'setup-base'])
})

test('rejects invalid step IDs', async t => {
  const store = new StateStore(new MemoryAdapter())
  await t.throwsAsync(store.setDone('../etc/passwd'), {instanceOf: InvalidStepIdError})
  await t.throwsAsync(store.getStatus('..'), {instanceOf: InvalidStepIdError})
  await t.throwsAsync(store.clear('a b'), {instanceOf: InvalidStepIdError})
})

test('markerDir is namespaced by environment', t => {
  t.is(StateStore.markerDir({root: '/mnt/rootstrap', environment: 'host'}), '/mnt/rootstrap/.rootstrap/markers/host')
  t.is(StateStore.markerDir({root: '/', environment: 'target-root'}), '/.rootstrap/markers/target-root')
})

test('marker files persist across store instances', async t => {
  const root = await createTmpDir()
  const first = StateStore.forContext({root, environment: 'host'})
  await first.setDone('toolchain-binutils')

  const second = StateStore.forContext({root, environment: 'host'})
  t.is(await second.getStatus('toolchain-binutils'), 'done')

  const files = await readdir(join(root, '.rootstrap', 'markers', 'host'))
  t.deepEqual(files, ['toolchain-binutils'])
  const body = await readFile(join(root, '.rootstrap', 'markers', 'host', 'toolchain-binutils'), 'utf8')
  t.regex(body, /^\d{4}-\d{2}-\d{2}T/)
})

test('environments do not share markers', async t => {
  const root = await createTmpDir()
  await StateStore.forContext({root, environment: 'host'}).setDone('bash')
  t.is(await StateStore.forContext({root, environment: 'target-root'}).getStatus('bash'), 'pending')
})

test('MarkerFileAdapter lists nothing for a missing directory', async t => {
  const root = await createTmpDir()
  const adapter = new MarkerFileAdapter(join(root, 'missing'))
  t.deepEqual(await adapter.keys(), [])
  t.false(await adapter.delete('x'))
})
