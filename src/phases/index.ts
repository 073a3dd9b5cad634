import type {PackageId} from '../recipes/packages.js'
import type {RecipeRegistry} from '../recipes/registry.js'
import type {EnvironmentKind, Phase} from '../types.js'
import {basePhase, profilePhase} from './base.js'
import {filesystemsPhase} from './filesystems.js'
import {packageManagerPhase} from './package-manager.js'
import {pseudoFilesystemsPhase} from './pseudo-filesystems.js'
import {hostsPhase, kernelPhase, packagesPhase} from './target.js'
import {toolchainPhase} from './toolchain.js'
import {transitionPhase} from './transition.js'

export const hostPhases: readonly Phase[] = [
  filesystemsPhase,
  basePhase,
  profilePhase,
  pseudoFilesystemsPhase,
  toolchainPhase,
  transitionPhase,
  packageManagerPhase
]

export function targetRootPhases(registry?: RecipeRegistry<PackageId>): Phase[] {
  return [packagesPhase(registry), hostsPhase, kernelPhase]
}

export function phasesFor(environment: EnvironmentKind, registry?: RecipeRegistry<PackageId>): Phase[] {
  return environment === 'host' ? [...hostPhases] : targetRootPhases(registry)
}

export {continuationScript, enterScript, continuationScriptPath, enterScriptPath} from './transition.js'
export {hostsFile, grubConfig} from './target.js'
