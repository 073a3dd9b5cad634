import {cpus, machine} from 'node:os'

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  if (minutes < 60) {
    const remainingSeconds = Math.round(seconds % 60)
    return `${minutes}m ${remainingSeconds}s`
  }

  const hours = Math.floor(minutes / 60)
  return `${hours}h ${minutes % 60}m`
}

/** Replaces anything outside `[A-Za-z0-9._-]` so the value is safe as a file name part. */
export function sanitizeName(value: string): string {
  return value.replaceAll(/[^\w.-]/g, '_')
}

/** Quotes a value for POSIX sh. */
export function shellQuote(value: string): string {
  if (/^[\w./:=@%+-]+$/.test(value)) {
    return value
  }

  return `'${value.replaceAll('\'', '\'\\\'\'')}'`
}

/** Number of processing units available for parallel compile actions. */
export function availableJobs(): number {
  return Math.max(1, cpus().length)
}

/** Target triple of the temporary toolchain, e.g. `x86_64-rootstrap-linux-gnu`. */
export function targetTriple(arch: string = machine()): string {
  return `${arch}-rootstrap-linux-gnu`
}

/** Whether a filesystem error means the path does not exist. */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
