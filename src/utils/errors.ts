/**
 * Extract error message from unknown error.
 * @param error - Unknown value from catch block
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * Wrap unknown error as Error instance.
 * @param error - Unknown value from catch block
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error
  }
  return new Error(String(error))
}

/**
 * Terminal failure of a setup step. The procedure stops and exits with status 1
 * after printing the message and the remediation lines.
 */
export class FatalSetupError extends Error {
  readonly remediation: readonly string[]

  constructor(message: string, remediation: readonly string[] = []) {
    super(message)
    this.name = 'FatalSetupError'
    this.remediation = remediation
  }
}

export function isFatalSetupError(error: unknown): error is FatalSetupError {
  return error instanceof FatalSetupError
}
