/** Base class of the errors that terminate a run with a specific exit code. */
export abstract class QualityError extends Error {
  abstract readonly exitCode: number
}

/** Bad input files, flags or environment. */
export class ConfigurationError extends QualityError {
  readonly exitCode = 2

  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** The external tool could not be started or exited abnormally. */
export class ExecutionError extends QualityError {
  readonly exitCode = 3

  constructor(
    message: string,
    readonly status: number | null,
    readonly stderr: string,
  ) {
    super(message)
    this.name = 'ExecutionError'
  }
}

/** The external tool output does not have the expected format. */
export class ParseError extends QualityError {
  readonly exitCode = 4

  constructor(message: string) {
    super(message)
    this.name = 'ParseError'
  }
}

/** Returns the process exit code for the given error. */
export function exitCodeFor(err: unknown): number {
  return err instanceof QualityError ? err.exitCode : 1
}
