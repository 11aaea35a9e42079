/**
 * @fileoverview CLI error handling
 *
 * Every failure reaches the user as one line, `--- spm-bootstrap: error: ...`,
 * followed by exit status 1.
 */

import { PROGRAM_NAME } from '../config/defaults.js';
import { isBootstrapError } from '../core/errors.js';
import { formatDiagnostic } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'UNKNOWN_COMMAND'
  | 'INVALID_ARGUMENT';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  UNKNOWN_COMMAND: `Run \`${PROGRAM_NAME} help\` to list the available commands.`,
  INVALID_ARGUMENT: `Run \`${PROGRAM_NAME} help <command>\` for usage information.`,
};

export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * The message part of the diagnostic line. Bootstrap and CLI errors carry
 * their own wording; anything else is reported by its message.
 */
export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    return error.suggestion ? `${error.message} (${error.suggestion})` : error.message;
  }
  if (isBootstrapError(error)) {
    return error.message;
  }
  return getErrorMessage(error);
}

export function formatFailureLine(error: unknown): string {
  return formatDiagnostic('error', formatError(error).replace(/\s*\n\s*/g, ' ').trim());
}
