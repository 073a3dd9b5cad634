/** Values an action's command line may depend on. */
export type RecipeEnv = {
  /** Root of the tree under construction, as seen from the running environment. */
  root: string;
  /** Cross-compilation target triple. */
  target: string;
  jobs: number;
  /** Extracted top-level source directory. */
  sourceDir: string;
  /** Out-of-tree build directory, or `sourceDir` when the recipe builds in place. */
  buildDir: string;
}

export type RecipeAction = {
  /** Log label, unique within the recipe. */
  label: string;
  run(env: RecipeEnv): string[];
  /** Defaults to `build`, which is the source directory for in-place recipes. */
  cwd?: 'source' | 'build';
  /** Appends `-j<jobs>` to the command. */
  parallel?: boolean;
  /** A non-zero exit becomes a notice. */
  optional?: boolean;
  env?: Record<string, string>;
}

/** An archive unpacked inside the main source tree under a fixed name (gcc's mpfr, gmp, mpc). */
export type BundledArchive = {
  archive: string;
  as: string;
  optional?: boolean;
}

export type Recipe<Id extends string = string> = {
  id: Id;
  /** Marker ID; defaults to `id`. */
  stepId?: string;
  /** Archive name prefix in the sources directory (`gcc` matches `gcc-14.2.0.tar.xz`). */
  archive: string;
  /** A missing archive is reported and the recipe skipped instead of failing the step. */
  optional?: boolean;
  bundles?: BundledArchive[];
  /** Builds in `<sourceDir>/build` instead of the source tree itself. */
  separateBuildDir?: boolean;
  prepare?: RecipeAction[];
  compile: RecipeAction[];
  install: RecipeAction[];
}

export function recipeStepId(recipe: Recipe): string {
  return recipe.stepId ?? recipe.id
}
