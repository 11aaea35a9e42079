/**
 * @fileoverview Flag parsing and pipeline setup shared by the build verbs
 */

import { parseArgs } from 'node:util';
import {
  assembleBuildConfiguration,
  BuildFlagsSchema,
  CleanFlagsSchema,
  parseFlags,
  TestFlagsSchema,
  type BuildFlags,
  type CleanFlags,
  type TestFlags,
} from '../../config/assembler.js';
import { nodeFileSystem, type BuildFileSystem } from '../../fs/operations.js';
import { createNodeHost, EnvironmentResolver, type HostEnvironment } from '../../host/environment.js';
import { StagedBuildDriver } from '../../pipeline/driver.js';
import { ExecaProcessInvoker, type ProcessInvoker } from '../../process/invoker.js';
import type { BuildConfiguration } from '../../types.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';
import { formatDuration, printKeyValue } from '../progress.js';

/**
 * Seams the commands reach the outside world through. Tests replace these.
 */
export interface CommandContext {
  cwd: string;
  fs: BuildFileSystem;
  createInvoker(verbose: boolean): ProcessInvoker;
  createHost(invoker: ProcessInvoker): HostEnvironment;
}

export function createDefaultContext(): CommandContext {
  return {
    cwd: process.cwd(),
    fs: nodeFileSystem,
    createInvoker: (verbose) => new ExecaProcessInvoker({ verbose }),
    createHost: (invoker) => createNodeHost(invoker),
  };
}

export interface CommandOptions {
  /** Arguments after the verb. */
  args: string[];
  context?: CommandContext;
}

// ============================================================================
// OPTION TABLES
// ============================================================================

export const CLEAN_OPTIONS = {
  'build-dir': { type: 'string' },
  verbose: { type: 'boolean', short: 'v' },
} as const;

export const BUILD_OPTIONS = {
  ...CLEAN_OPTIONS,
  swiftc: { type: 'string' },
  release: { type: 'boolean' },
  'project-root': { type: 'string' },
  'llbuild-source-dir': { type: 'string' },
  'llbuild-build-dir': { type: 'string' },
  'llbuild-link-framework': { type: 'boolean' },
  prefix: { type: 'string', multiple: true },
  'install-libspm': { type: 'boolean' },
  reconfigure: { type: 'boolean' },
} as const;

export const TEST_OPTIONS = {
  ...BUILD_OPTIONS,
  parallel: { type: 'boolean' },
  'no-parallel': { type: 'boolean' },
  filter: { type: 'string', multiple: true },
} as const;

/** Unknown flags, missing values and stray positionals become CLI errors. */
function withArgumentErrors<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

export function parseCleanArgs(args: string[]): CleanFlags {
  const { values } = withArgumentErrors(() =>
    parseArgs({ args, options: CLEAN_OPTIONS, strict: true, allowPositionals: false }));
  return parseFlags(CleanFlagsSchema, {
    buildDir: values['build-dir'],
    verbose: values.verbose,
  });
}

export function parseBuildArgs(args: string[]): BuildFlags {
  const { values } = withArgumentErrors(() =>
    parseArgs({ args, options: BUILD_OPTIONS, strict: true, allowPositionals: false }));
  return parseFlags(BuildFlagsSchema, {
    buildDir: values['build-dir'],
    verbose: values.verbose,
    swiftc: values.swiftc,
    release: values.release,
    projectRoot: values['project-root'],
    llbuildSourceDir: values['llbuild-source-dir'],
    llbuildBuildDir: values['llbuild-build-dir'],
    llbuildLinkFramework: values['llbuild-link-framework'],
    prefix: values.prefix,
    installLibspm: values['install-libspm'],
    reconfigure: values.reconfigure,
  });
}

export function parseTestArgs(args: string[]): TestFlags {
  const { values } = withArgumentErrors(() =>
    parseArgs({ args, options: TEST_OPTIONS, strict: true, allowPositionals: false }));
  return parseFlags(TestFlagsSchema, {
    buildDir: values['build-dir'],
    verbose: values.verbose,
    swiftc: values.swiftc,
    release: values.release,
    projectRoot: values['project-root'],
    llbuildSourceDir: values['llbuild-source-dir'],
    llbuildBuildDir: values['llbuild-build-dir'],
    llbuildLinkFramework: values['llbuild-link-framework'],
    prefix: values.prefix,
    installLibspm: values['install-libspm'],
    reconfigure: values.reconfigure,
    parallel: values['no-parallel'] ? false : values.parallel,
    filter: values.filter,
  });
}

// ============================================================================
// PIPELINE SETUP
// ============================================================================

export interface PreparedPipeline {
  config: BuildConfiguration;
  driver: StagedBuildDriver;
}

/**
 * Resolve host facts, assemble the configuration and create the driver.
 * Compiler lookup failures surface here, before any stage runs.
 */
export async function preparePipeline(flags: BuildFlags, context: CommandContext): Promise<PreparedPipeline> {
  const invoker = context.createInvoker(flags.verbose);
  const resolver = new EnvironmentResolver(context.createHost(invoker));
  const facts = await resolver.resolveHostFacts(flags.swiftc);
  const config = assembleBuildConfiguration(flags, facts, context.cwd);
  const driver = new StagedBuildDriver(config, { invoker, fs: context.fs });
  return { config, driver };
}

export function printStageSummary(driver: StagedBuildDriver): void {
  const items = driver.history.map((record) => ({
    key: record.stage,
    value: record.configured === undefined
      ? formatDuration(record.durationMs)
      : `${formatDuration(record.durationMs)}${record.configured ? ' (configured)' : ' (cached configuration)'}`,
  }));
  if (items.length === 0) return;
  console.log('Stages:');
  printKeyValue(items);
}
