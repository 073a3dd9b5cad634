import {buildRecipe} from '../core/package-builder.js'
import {recipeStepId, type Recipe} from '../recipes/types.js'
import type {StepEntry} from '../types.js'

export function recipeStep(recipe: Recipe, name?: string): StepEntry {
  return {
    kind: 'step',
    id: recipeStepId(recipe),
    name: name ?? recipe.id,
    action: async build => buildRecipe(recipe, build)
  }
}
