/**
 * @fileoverview Command Dispatcher
 *
 * Maps a verb to its pipeline. Running without a verb (or with only flags)
 * runs {@link DEFAULT_COMMAND}.
 */

import { PROGRAM_NAME, SPM_BOOTSTRAP_VERSION } from '../config/defaults.js';
import { logError } from '../telemetry/logger.js';
import type { CommandName, PipelineState } from '../types.js';
import { buildCommand } from './commands/build.js';
import { cleanCommand } from './commands/clean.js';
import { installCommand } from './commands/install.js';
import type { CommandContext, CommandOptions } from './commands/shared.js';
import { testCommand } from './commands/test.js';
import { createError, ExitCodes, formatFailureLine, type ExitCode } from './errors.js';
import { showHelp } from './help.js';

export const DEFAULT_COMMAND: CommandName = 'build';

interface CommandEntry {
  description: string;
  usage: string;
  run: (options: CommandOptions) => Promise<PipelineState>;
}

export const COMMANDS: Record<CommandName, CommandEntry> = {
  clean: {
    description: 'Remove the build directory',
    usage: `${PROGRAM_NAME} clean [--build-dir PATH] [-v]`,
    run: cleanCommand,
  },
  build: {
    description: 'Build llbuild, then the package manager with CMake and with itself',
    usage: `${PROGRAM_NAME} build [--swiftc PATH] [--release] [--build-dir PATH] [-v]`,
    run: buildCommand,
  },
  test: {
    description: 'Build, then run the self-built test runner',
    usage: `${PROGRAM_NAME} test [--filter NAME]... [--no-parallel] [build options]`,
    run: testCommand,
  },
  install: {
    description: 'Build, then install the CMake-built products',
    usage: `${PROGRAM_NAME} install [build options]`,
    run: installCommand,
  },
};

function isCommandName(value: string): value is CommandName {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

export interface CommandSelection {
  command: CommandName;
  args: string[];
}

export function selectCommand(argv: readonly string[]): CommandSelection {
  const [first, ...rest] = argv;
  if (first === undefined || first.startsWith('-')) {
    return { command: DEFAULT_COMMAND, args: [...argv] };
  }
  if (isCommandName(first)) {
    return { command: first, args: rest };
  }
  throw createError('UNKNOWN_COMMAND', `Unknown command: ${first}`, { command: first });
}

function wantsHelp(args: readonly string[]): boolean {
  return args.includes('-h') || args.includes('--help');
}

/**
 * Run one invocation and report the exit code instead of exiting, so callers
 * (and tests) decide what to do with it.
 */
export async function runCli(argv: readonly string[], context?: CommandContext): Promise<ExitCode> {
  const [first, ...rest] = argv;

  if (first === 'help') {
    showHelp(rest[0]);
    return ExitCodes.SUCCESS;
  }
  if (first === '--version') {
    console.log(`${PROGRAM_NAME} ${SPM_BOOTSTRAP_VERSION}`);
    return ExitCodes.SUCCESS;
  }

  try {
    const { command, args } = selectCommand(argv);
    if (wantsHelp(args)) {
      showHelp(first === undefined || first.startsWith('-') ? undefined : command);
      return ExitCodes.SUCCESS;
    }
    await COMMANDS[command].run({ args, context });
    return ExitCodes.SUCCESS;
  } catch (error) {
    logError(formatFailureLine(error));
    return ExitCodes.FAILURE;
  }
}
