import { resolveCleanTarget } from '../../config/assembler.js';
import { cleanBuildRoot } from '../../pipeline/driver.js';
import type { PipelineState } from '../../types.js';
import { createDefaultContext, parseCleanArgs, type CommandOptions } from './shared.js';

export type CleanCommandOptions = CommandOptions;

export async function cleanCommand(options: CleanCommandOptions): Promise<PipelineState> {
  const context = options.context ?? createDefaultContext();
  const flags = parseCleanArgs(options.args);
  const buildRoot = resolveCleanTarget(flags, context.cwd);
  return cleanBuildRoot(buildRoot, context.fs, flags.verbose);
}
