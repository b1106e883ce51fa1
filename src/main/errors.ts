/**
 * Error taxonomy for the counter core.
 *
 * None of these is fatal to the process: validation errors are returned to
 * the caller before any state changes, storage errors are retried by the
 * flush scheduler, and a shutdown timeout is reported once on exit.
 */

class CounterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

class ValidationError extends CounterError {
  issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.issues = issues
  }
}

class StorageError extends CounterError {
  operation: string

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`Storage operation "${operation}" failed: ${detail}`, { cause })
    this.operation = operation
  }
}

class ShutdownTimeoutError extends CounterError {
  attempts: number

  constructor(timeoutMs: number, attempts: number, cause?: unknown) {
    super(`Final save did not complete within ${timeoutMs}ms (${attempts} attempts)`, { cause })
    this.attempts = attempts
  }
}

export { CounterError, ShutdownTimeoutError, StorageError, ValidationError }
