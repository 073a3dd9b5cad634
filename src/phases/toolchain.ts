import {binutilsPass1, compilerRecipes} from '../recipes/toolchain.js'
import type {Phase} from '../types.js'
import {recipeStep} from './steps.js'

export const toolchainPhase: Phase = {
  id: 'toolchain',
  title: 'Temporary toolchain',
  environment: 'host',
  plan: () => [
    recipeStep(binutilsPass1, 'binutils (pass 1)'),
    ...compilerRecipes.map(recipe => recipeStep(recipe))
  ]
}
