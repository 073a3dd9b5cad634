export class RootstrapError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'RootstrapError'
  }
}

// -- Configuration errors ----------------------------------------------------

export class ConfigurationError extends RootstrapError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ConfigurationError'
  }
}

export class MissingSettingError extends ConfigurationError {
  constructor(
    readonly setting: string,
    envVar: string,
    options?: {cause?: unknown}
  ) {
    super('MISSING_SETTING', `Missing required setting "${setting}" (set ${envVar}, e.g. /dev/sda2)`, options)
    this.name = 'MissingSettingError'
  }
}

export class InsufficientPrivilegeError extends ConfigurationError {
  constructor(uid: number | undefined, options?: {cause?: unknown}) {
    super('INSUFFICIENT_PRIVILEGE', `rootstrap must be run as root (current uid: ${uid ?? 'unknown'})`, options)
    this.name = 'InsufficientPrivilegeError'
  }
}

// -- Build errors ------------------------------------------------------------

export class BuildError extends RootstrapError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'BuildError'
  }
}

export class ArchiveNotFoundError extends BuildError {
  constructor(
    readonly archive: string,
    readonly sourcesDir: string,
    options?: {cause?: unknown}
  ) {
    super('ARCHIVE_NOT_FOUND', `No archive found for "${archive}" in ${sourcesDir}`, options)
    this.name = 'ArchiveNotFoundError'
  }
}

export class ActionFailedError extends BuildError {
  constructor(
    readonly subject: string,
    readonly label: string,
    readonly exitCode: number,
    readonly logPath: string,
    options?: {cause?: unknown}
  ) {
    super('ACTION_FAILED', `${subject} (${label}) failed with exit code ${exitCode}, see ${logPath}`, options)
    this.name = 'ActionFailedError'
  }
}

export class SourceTreeError extends BuildError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('SOURCE_TREE_MISSING', message, options)
    this.name = 'SourceTreeError'
  }
}

export class ToolNotAvailableError extends BuildError {
  constructor(tool: string, options?: {cause?: unknown}) {
    super('TOOL_NOT_AVAILABLE', `Required tool "${tool}" not found on PATH`, options)
    this.name = 'ToolNotAvailableError'
  }
}

// -- Orchestration errors ----------------------------------------------------

export class OrchestrationError extends RootstrapError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'OrchestrationError'
  }
}

export class StepFailedError extends OrchestrationError {
  constructor(
    readonly stepId: string,
    readonly phaseId: string,
    readonly logPath?: string,
    options?: {cause?: unknown}
  ) {
    const where = logPath ? `, see ${logPath}` : ''
    super('STEP_FAILED', `Step ${stepId} failed in phase ${phaseId}${where}`, options)
    this.name = 'StepFailedError'
  }
}

export class InvalidStepIdError extends OrchestrationError {
  constructor(stepId: string, options?: {cause?: unknown}) {
    super('INVALID_STEP_ID', `Invalid step ID: "${stepId}"`, options)
    this.name = 'InvalidStepIdError'
  }
}

// -- Recipe errors -----------------------------------------------------------

export class RecipeError extends RootstrapError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'RecipeError'
  }
}

export class UnknownPackageError extends RecipeError {
  constructor(name: string, options?: {cause?: unknown}) {
    super('UNKNOWN_PACKAGE', `Cannot register recipe for undeclared package "${name}"`, options)
    this.name = 'UnknownPackageError'
  }
}

export class DuplicateRecipeError extends RecipeError {
  constructor(name: string, options?: {cause?: unknown}) {
    super('DUPLICATE_RECIPE', `A recipe for "${name}" is already registered`, options)
    this.name = 'DuplicateRecipeError'
  }
}
