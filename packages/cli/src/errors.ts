/**
 * Errors the CLI reports to the user.
 * Exit codes: 0 success, 1 invalid input or configuration, 2 runtime failure.
 */

export type CliErrorCode = 'VALIDATION' | 'RUNTIME';

export class CliError extends Error {
  constructor(
    readonly code: CliErrorCode,
    message: string,
    readonly details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export function exitCodeFor(error: CliError): 1 | 2 {
  return error.code === 'VALIDATION' ? 1 : 2;
}
