import {DuplicateRecipeError, UnknownPackageError} from '../errors.js'
import type {Recipe} from './types.js'

export type Dispatch<Id extends string> =
  | {kind: 'recipe'; recipe: Recipe<Id>}
  | {kind: 'unsupported'; name: string}

/**
 * Recipes keyed by a closed set of package identifiers. Registration checks
 * membership and uniqueness, so a misspelled or doubled recipe fails when the
 * registry is built rather than when the package loop reaches it.
 */
export class RecipeRegistry<Id extends string> {
  private readonly recipes = new Map<string, Recipe<Id>>()

  constructor(readonly packages: readonly Id[]) {}

  register(recipe: Recipe<Id>): this {
    if (!this.isPackage(recipe.id)) {
      throw new UnknownPackageError(recipe.id)
    }

    if (this.recipes.has(recipe.id)) {
      throw new DuplicateRecipeError(recipe.id)
    }

    this.recipes.set(recipe.id, recipe)
    return this
  }

  /** Total lookup: every name yields a recipe or an explicit gap. */
  dispatch(name: string): Dispatch<Id> {
    const recipe = this.recipes.get(name)
    if (recipe && this.isPackage(name)) {
      return {kind: 'recipe', recipe}
    }

    return {kind: 'unsupported', name}
  }

  has(name: string): boolean {
    return this.recipes.has(name)
  }

  private isPackage(name: string): name is Id {
    return this.packages.some(id => id === name)
  }
}
