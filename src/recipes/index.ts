export type {Recipe, RecipeAction, RecipeEnv, BundledArchive} from './types.js'
export {recipeStepId} from './types.js'
export {RecipeRegistry, type Dispatch} from './registry.js'
export {packageIds, type PackageId, builtinRecipes, createPackageRegistry} from './packages.js'
export {binutilsPass1, gccPass1, linuxHeaders, glibc, compilerRecipes} from './toolchain.js'
export {guix} from './guix.js'
