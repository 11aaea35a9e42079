/**
 * @fileoverview Bootstrap error hierarchy
 *
 * Every failure the pipeline can surface is one of these typed errors. None of
 * them is retryable: a failed stage ends the run.
 */

import type { CommandVector } from '../types.js';

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class BootstrapError extends Error {
  abstract readonly code: string;
}

// ============================================================================
// TOOL LOOKUP ERRORS
// ============================================================================

export class ToolNotFoundError extends BootstrapError {
  readonly code = 'TOOL_NOT_FOUND';

  constructor(
    readonly tool: string,
    message: string,
  ) {
    super(message);
    this.name = 'ToolNotFoundError';
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends BootstrapError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`Invalid ${field}: ${message}`);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// PROCESS ERRORS
// ============================================================================

/**
 * Render a command vector for display. Arguments containing whitespace or
 * quotes are JSON-quoted; the vector itself is never passed through a shell.
 */
export function renderCommand(command: CommandVector): string {
  return command
    .map((arg) => (arg === '' || /[\s"'\\]/.test(arg) ? JSON.stringify(arg) : arg))
    .join(' ');
}

export interface ProcessFailure {
  /** Exit status, or null when the child never exited normally. */
  exitStatus: number | null;
  /** Signal that terminated the child. */
  signal?: string;
  /** Why the child could not be started. */
  reason?: string;
}

function describeFailure({ exitStatus, signal, reason }: ProcessFailure): string {
  if (exitStatus !== null) return `failed with exit status ${exitStatus}`;
  if (signal) return `was terminated by ${signal}`;
  return reason ? `could not be started (${reason})` : 'could not be started';
}

export class ProcessError extends BootstrapError {
  readonly code = 'PROCESS_ERROR';
  readonly exitStatus: number | null;
  readonly signal?: string;
  readonly reason?: string;

  constructor(
    readonly command: CommandVector,
    failure: ProcessFailure,
    readonly cwd?: string,
  ) {
    super(`command ${describeFailure(failure)}: ${renderCommand(command)}`);
    this.name = 'ProcessError';
    this.exitStatus = failure.exitStatus;
    if (failure.signal) this.signal = failure.signal;
    if (failure.reason) this.reason = failure.reason;
  }
}

// ============================================================================
// FILESYSTEM ERRORS
// ============================================================================

export type FilesystemOperation = 'mkdir' | 'symlink' | 'remove' | 'write' | 'stat';

export class FilesystemError extends BootstrapError {
  readonly code = 'FILESYSTEM_ERROR';

  constructor(
    readonly operation: FilesystemOperation,
    readonly path: string,
    message: string,
  ) {
    super(`Filesystem ${operation} failed for ${path}: ${message}`);
    this.name = 'FilesystemError';
  }
}

export function isBootstrapError(error: unknown): error is BootstrapError {
  return error instanceof BootstrapError;
}
