import type { PipelineState } from '../../types.js';
import {
  createDefaultContext,
  parseBuildArgs,
  preparePipeline,
  printStageSummary,
  type CommandOptions,
} from './shared.js';

export type InstallCommandOptions = CommandOptions;

export async function installCommand(options: InstallCommandOptions): Promise<PipelineState> {
  const context = options.context ?? createDefaultContext();
  const flags = parseBuildArgs(options.args);
  const { driver } = await preparePipeline(flags, context);

  await driver.install();
  printStageSummary(driver);
  return driver.state;
}
