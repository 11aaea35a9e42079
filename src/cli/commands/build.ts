/**
 * @fileoverview Build command - dependency, native bootstrap and self build
 */

import type { PipelineState } from '../../types.js';
import {
  createDefaultContext,
  parseBuildArgs,
  preparePipeline,
  printStageSummary,
  type CommandOptions,
} from './shared.js';

export type BuildCommandOptions = CommandOptions;

export async function buildCommand(options: BuildCommandOptions): Promise<PipelineState> {
  const context = options.context ?? createDefaultContext();
  const flags = parseBuildArgs(options.args);
  const { driver } = await preparePipeline(flags, context);

  await driver.build();
  printStageSummary(driver);
  return driver.state;
}
