import {mkdir, rename, rm, stat} from 'node:fs/promises'
import {join} from 'node:path'
import {ArchiveNotFoundError, SourceTreeError} from '../errors.js'
import type {Recipe, RecipeAction, RecipeEnv} from '../recipes/types.js'
import type {BuildContext} from '../types.js'
import {archiveStem} from './archive-resolver.js'

/**
 * Builds one package from its source archive:
 * extract, unpack bundles, then run prepare, compile and install actions in
 * order. Logs are named `<recipe>-<label>.log`.
 *
 * Any previous tree for the archive is removed before extraction, so a step
 * interrupted half-way starts over from a clean tree.
 */
export async function buildRecipe(recipe: Recipe, build: BuildContext): Promise<void> {
  const resolution = await build.archives.resolve(recipe.archive)
  if (!resolution.found) {
    if (recipe.optional) {
      build.notice(`No ${recipe.archive} archive in ${build.paths.sources}, skipping ${recipe.id}`)
      return
    }

    throw new ArchiveNotFoundError(recipe.archive, build.paths.sources)
  }

  const {work} = build.paths
  await mkdir(work, {recursive: true})

  const sourceDir = join(work, archiveStem(resolution.path))
  await rm(sourceDir, {recursive: true, force: true})
  await build.exec({subject: recipe.id, label: 'extract', cmd: ['tar', '-xf', resolution.path], cwd: work})
  await assertDirectory(sourceDir, `${resolution.path} did not unpack into ${sourceDir}`)

  for (const bundle of recipe.bundles ?? []) {
    const bundled = await build.archives.resolve(bundle.archive)
    if (!bundled.found) {
      if (bundle.optional) {
        build.notice(`No ${bundle.archive} archive in ${build.paths.sources}, ${recipe.id} continues without it`)
        continue
      }

      throw new ArchiveNotFoundError(bundle.archive, build.paths.sources)
    }

    await build.exec({subject: recipe.id, label: `extract-${bundle.as}`, cmd: ['tar', '-xf', bundled.path], cwd: sourceDir})
    const unpacked = join(sourceDir, archiveStem(bundled.path))
    await assertDirectory(unpacked, `${bundled.path} did not unpack into ${unpacked}`)
    if (unpacked !== join(sourceDir, bundle.as)) {
      await rename(unpacked, join(sourceDir, bundle.as))
    }
  }

  const buildDir = recipe.separateBuildDir ? join(sourceDir, 'build') : sourceDir
  if (recipe.separateBuildDir) {
    await mkdir(buildDir, {recursive: true})
  }

  const env: RecipeEnv = {root: build.paths.root, target: build.target, jobs: build.jobs, sourceDir, buildDir}
  const actions: RecipeAction[] = [...recipe.prepare ?? [], ...recipe.compile, ...recipe.install]

  for (const action of actions) {
    const cmd = action.run(env)
    await build.exec({
      subject: recipe.id,
      label: action.label,
      cmd: action.parallel ? [...cmd, `-j${build.jobs}`] : cmd,
      cwd: action.cwd === 'source' ? sourceDir : buildDir,
      env: action.env,
      optional: action.optional
    })
  }
}

async function assertDirectory(path: string, message: string): Promise<void> {
  try {
    const stats = await stat(path)
    if (stats.isDirectory()) {
      return
    }
  } catch (error) {
    throw new SourceTreeError(message, {cause: error})
  }

  throw new SourceTreeError(message)
}
