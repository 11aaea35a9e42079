/**
 * @fileoverview Test command - build, then run the self-built test runner
 */

import type { PipelineState } from '../../types.js';
import {
  createDefaultContext,
  parseTestArgs,
  preparePipeline,
  printStageSummary,
  type CommandOptions,
} from './shared.js';

export type TestCommandOptions = CommandOptions;

export async function testCommand(options: TestCommandOptions): Promise<PipelineState> {
  const context = options.context ?? createDefaultContext();
  const flags = parseTestArgs(options.args);
  const { driver } = await preparePipeline(flags, context);

  await driver.test({ parallel: flags.parallel, filters: flags.filter });
  printStageSummary(driver);
  return driver.state;
}
