import test from 'ava'
import {mkdir, readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {ActionFailedError} from '../../errors.js'
import type {LogLine} from '../../engine/index.js'
import {ActionLog} from '../action-log.js'
import {createTmpDir, FakeExecutor} from '../../__tests__/helpers.js'

test('writes command and output to <subject>-<label>.log', async t => {
  const logDir = await createTmpDir()
  const executor = new FakeExecutor(() => ({stdout: ['checking for gcc... gcc'], stderr: ['warning: old']}))
  const log = new ActionLog(executor, logDir)

  const result = await log.run({subject: 'binutils-pass1', label: 'configure', cmd: ['../configure', '--disable-nls'], cwd: '/work'})

  t.is(result.exitCode, 0)
  t.is(result.logPath, join(logDir, 'binutils-pass1-configure.log'))
  const content = await readFile(result.logPath, 'utf8')
  t.is(content, '$ ../configure --disable-nls\nchecking for gcc... gcc\nwarning: old\n')
  t.deepEqual(executor.requests, [{cmd: ['../configure', '--disable-nls'], cwd: '/work'}])
})

test('forwards lines to the callback', async t => {
  const logDir = await createTmpDir()
  const log = new ActionLog(new FakeExecutor(() => ({stdout: ['a'], stderr: ['b']})), logDir)
  const lines: LogLine[] = []
  await log.run({subject: 's', label: 'l', cmd: ['true'], cwd: '/'}, line => {
    lines.push(line)
  })
  t.deepEqual(lines, [{stream: 'stdout', line: 'a'}, {stream: 'stderr', line: 'b'}])
})

test('truncates the log on each run', async t => {
  const logDir = await createTmpDir()
  let attempt = 0
  const log = new ActionLog(new FakeExecutor(() => ({stdout: [`attempt ${++attempt}`]})), logDir)
  await log.run({subject: 'gcc', label: 'make', cmd: ['make'], cwd: '/'})
  const {logPath} = await log.run({subject: 'gcc', label: 'make', cmd: ['make'], cwd: '/'})
  t.is(await readFile(logPath, 'utf8'), '$ make\nattempt 2\n')
})

test('throws ActionFailedError on non-zero exit', async t => {
  const logDir = await createTmpDir()
  const log = new ActionLog(new FakeExecutor(() => ({exitCode: 2})), logDir)
  const error = await t.throwsAsync(
    log.run({subject: 'gcc', label: 'make', cmd: ['make'], cwd: '/'}),
    {instanceOf: ActionFailedError}
  )
  t.is(error?.exitCode, 2)
  t.is(error?.logPath, join(logDir, 'gcc-make.log'))
})

test('optional actions return the failing result', async t => {
  const logDir = await createTmpDir()
  const log = new ActionLog(new FakeExecutor(() => ({exitCode: 1})), logDir)
  const result = await log.run({subject: 'gcc', label: 'prerequisites', cmd: ['./contrib/download_prerequisites'], cwd: '/', optional: true})
  t.is(result.exitCode, 1)
})

test('an unwritable log fails before the action runs', async t => {
  const logDir = await createTmpDir()
  await mkdir(join(logDir, 'x-make.log'))
  const executor = new FakeExecutor()
  const log = new ActionLog(executor, logDir)

  const error = await t.throwsAsync(log.run({subject: 'x', label: 'make', cmd: ['make'], cwd: '/'}))
  t.is(error !== undefined && 'code' in error ? error.code : undefined, 'EISDIR')
  t.deepEqual(executor.requests, [])
})

test('sanitizes log name parts', t => {
  const log = new ActionLog(new FakeExecutor(), '/logs')
  t.is(log.logPath('gcc/pass 1', 'make all'), '/logs/gcc_pass_1-make_all.log')
})
