/**
 * @fileoverview Process Invoker
 *
 * Runs external commands from structured command vectors. Output of `run` is
 * streamed straight to the terminal; `capture` collects stdout. A nonzero exit,
 * a terminating signal or a failure to spawn becomes a {@link ProcessError}
 * that names the command. Nothing is retried.
 */

import { execa } from 'execa';
import { ConfigurationError, ProcessError, renderCommand, type ProcessFailure } from '../core/errors.js';
import { logInfo } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { CommandVector, EnvironmentOverlay } from '../types.js';

export interface RunOptions {
  cwd?: string;
  /** Extra variables for this child only; merged over the inherited environment. */
  env?: EnvironmentOverlay;
}

export interface ProcessInvoker {
  run(command: CommandVector, options?: RunOptions): Promise<void>;
  capture(command: CommandVector, options?: RunOptions): Promise<string>;
}

export interface ExecaInvokerOptions {
  verbose?: boolean;
}

export function overlayToEnv(overlay: EnvironmentOverlay | undefined): Record<string, string> | undefined {
  if (!overlay || overlay.length === 0) return undefined;
  const env: Record<string, string> = {};
  for (const [name, value] of overlay) {
    env[name] = value;
  }
  return env;
}

function splitCommand(command: CommandVector): [string, string[]] {
  const [file, ...args] = command;
  if (!file) {
    throw new ConfigurationError('command', 'empty command vector');
  }
  return [file, args];
}

/** The fields of an execa result that explain a failure. */
interface ExecaOutcome {
  failed: boolean;
  exitCode?: number;
  signal?: string;
  cause?: unknown;
  shortMessage?: string;
}

/**
 * With `reject: false` execa resolves for every outcome: a nonzero exit, a
 * terminating signal and a spawn failure (`cause`) all arrive here.
 */
function toProcessFailure(result: ExecaOutcome): ProcessFailure | undefined {
  if (!result.failed && result.exitCode === 0) return undefined;
  if (result.exitCode !== undefined) return { exitStatus: result.exitCode };
  if (result.signal) return { exitStatus: null, signal: result.signal };
  const reason = result.cause !== undefined ? getErrorMessage(result.cause) : result.shortMessage;
  return reason ? { exitStatus: null, reason } : { exitStatus: null };
}

export class ExecaProcessInvoker implements ProcessInvoker {
  private readonly verbose: boolean;

  constructor(options: ExecaInvokerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  async run(command: CommandVector, options: RunOptions = {}): Promise<void> {
    const [file, args] = splitCommand(command);
    this.echo(command);

    let failure: ProcessFailure | undefined;
    try {
      const result = await execa(file, args, {
        cwd: options.cwd,
        env: overlayToEnv(options.env),
        stdio: 'inherit',
        reject: false,
      });
      failure = toProcessFailure(result);
    } catch (error) {
      // Invalid options are still thrown.
      throw new ProcessError(command, { exitStatus: null, reason: getErrorMessage(error) }, options.cwd);
    }
    if (failure) {
      throw new ProcessError(command, failure, options.cwd);
    }
  }

  async capture(command: CommandVector, options: RunOptions = {}): Promise<string> {
    const [file, args] = splitCommand(command);
    this.echo(command);

    let output: string;
    let failure: ProcessFailure | undefined;
    try {
      const result = await execa(file, args, {
        cwd: options.cwd,
        env: overlayToEnv(options.env),
        reject: false,
      });
      failure = toProcessFailure(result);
      output = String(result.stdout ?? '').trim();
    } catch (error) {
      throw new ProcessError(command, { exitStatus: null, reason: getErrorMessage(error) }, options.cwd);
    }
    if (failure) {
      throw new ProcessError(command, failure, options.cwd);
    }
    return output;
  }

  private echo(command: CommandVector): void {
    if (this.verbose) {
      logInfo(renderCommand(command));
    }
  }
}
