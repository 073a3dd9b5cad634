import test from 'ava'
import {
  RootstrapError,
  ConfigurationError,
  MissingSettingError,
  InsufficientPrivilegeError,
  BuildError,
  ArchiveNotFoundError,
  ActionFailedError,
  SourceTreeError,
  ToolNotAvailableError,
  OrchestrationError,
  StepFailedError,
  InvalidStepIdError,
  RecipeError,
  UnknownPackageError,
  DuplicateRecipeError
} from '../errors.js'

// -- instanceof chains -------------------------------------------------------

test('MissingSettingError is instanceof ConfigurationError and RootstrapError', t => {
  const error = new MissingSettingError('rootPartition', 'ROOT_PART')
  t.true(error instanceof MissingSettingError)
  t.true(error instanceof ConfigurationError)
  t.true(error instanceof RootstrapError)
  t.true(error instanceof Error)
})

test('InsufficientPrivilegeError is instanceof ConfigurationError and RootstrapError', t => {
  const error = new InsufficientPrivilegeError(1000)
  t.true(error instanceof ConfigurationError)
  t.true(error instanceof RootstrapError)
})

test('build errors are instanceof BuildError and RootstrapError', t => {
  const errors = [
    new ArchiveNotFoundError('gcc', '/sources'),
    new ActionFailedError('gcc', 'make', 2, '/logs/gcc-make.log'),
    new SourceTreeError('missing'),
    new ToolNotAvailableError('tar')
  ]
  for (const error of errors) {
    t.true(error instanceof BuildError)
    t.true(error instanceof RootstrapError)
  }
})

test('orchestration errors are instanceof OrchestrationError', t => {
  t.true(new StepFailedError('gcc-final', 'packages') instanceof OrchestrationError)
  t.true(new InvalidStepIdError('../x') instanceof OrchestrationError)
})

test('recipe errors are instanceof RecipeError', t => {
  t.true(new UnknownPackageError('firefox') instanceof RecipeError)
  t.true(new DuplicateRecipeError('bash') instanceof RecipeError)
})

// -- codes and messages ------------------------------------------------------

test('MissingSettingError names the setting and its variable', t => {
  const error = new MissingSettingError('rootPartition', 'ROOT_PART')
  t.is(error.code, 'MISSING_SETTING')
  t.is(error.setting, 'rootPartition')
  t.is(error.message, 'Missing required setting "rootPartition" (set ROOT_PART, e.g. /dev/sda2)')
  t.is(error.name, 'MissingSettingError')
})

test('InsufficientPrivilegeError reports the uid', t => {
  t.is(new InsufficientPrivilegeError(1000).message, 'rootstrap must be run as root (current uid: 1000)')
  t.is(new InsufficientPrivilegeError(undefined).message, 'rootstrap must be run as root (current uid: unknown)')
})

test('ArchiveNotFoundError names the archive and directory', t => {
  const error = new ArchiveNotFoundError('binutils', '/mnt/rootstrap/sources')
  t.is(error.code, 'ARCHIVE_NOT_FOUND')
  t.is(error.message, 'No archive found for "binutils" in /mnt/rootstrap/sources')
})

test('ActionFailedError carries subject, label, exit code and log path', t => {
  const error = new ActionFailedError('binutils-pass1', 'configure', 77, '/logs/binutils-pass1-configure.log')
  t.is(error.code, 'ACTION_FAILED')
  t.is(error.exitCode, 77)
  t.is(error.logPath, '/logs/binutils-pass1-configure.log')
  t.is(error.message, 'binutils-pass1 (configure) failed with exit code 77, see /logs/binutils-pass1-configure.log')
})

test('StepFailedError mentions the log path only when known', t => {
  t.is(new StepFailedError('a', 'p').message, 'Step a failed in phase p')
  t.is(new StepFailedError('a', 'p', '/logs/a-make.log').message, 'Step a failed in phase p, see /logs/a-make.log')
})

test('cause is preserved', t => {
  const cause = new Error('root cause')
  const error = new StepFailedError('a', 'p', undefined, {cause})
  t.is(error.cause, cause)
})

test('recipe error codes', t => {
  t.is(new UnknownPackageError('firefox').code, 'UNKNOWN_PACKAGE')
  t.is(new DuplicateRecipeError('bash').code, 'DUPLICATE_RECIPE')
})
