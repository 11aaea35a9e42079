/**
 * @fileoverview Configuration Assembler
 *
 * Validates the flag record produced by the CLI and turns it, together with the
 * host facts, into an immutable {@link BuildConfiguration}. Assembly itself
 * performs no I/O: the same flags, host facts and working directory always
 * produce the same configuration.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { z } from 'zod';
import {
  BOOTSTRAP_DIR_NAME,
  DEFAULT_BUILD_DIR,
  DEFAULT_INSTALL_PREFIX,
  DEPENDENCY_DIR_NAME,
} from './defaults.js';
import { ConfigurationError } from '../core/errors.js';
import type { BuildConfiguration, BuildMode, HostFacts } from '../types.js';

// ============================================================================
// FLAG SCHEMAS
// ============================================================================

const PathSchema = z.string().trim().min(1, 'path must not be empty');

export const CleanFlagsSchema = z.object({
  buildDir: PathSchema.default(DEFAULT_BUILD_DIR),
  verbose: z.boolean().default(false),
}).strict();

export const BuildFlagsSchema = CleanFlagsSchema.extend({
  swiftc: PathSchema.optional(),
  release: z.boolean().default(false),
  projectRoot: PathSchema.optional(),
  llbuildSourceDir: PathSchema.optional(),
  llbuildBuildDir: PathSchema.optional(),
  llbuildLinkFramework: z.boolean().default(false),
  prefix: z.array(PathSchema).default([]),
  installLibspm: z.boolean().default(false),
  reconfigure: z.boolean().default(false),
}).strict();

export const TestFlagsSchema = BuildFlagsSchema.extend({
  parallel: z.boolean().default(true),
  filter: z.array(z.string().min(1, 'filter must not be empty')).default([]),
}).strict();

export type CleanFlags = z.output<typeof CleanFlagsSchema>;
export type BuildFlags = z.output<typeof BuildFlagsSchema>;
export type TestFlags = z.output<typeof TestFlagsSchema>;

/**
 * Validate a raw flag record against one of the schemas above.
 *
 * @throws ConfigurationError naming the first offending flag
 */
export function parseFlags<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'flags';
  throw new ConfigurationError(field, issue?.message ?? 'invalid flags');
}

// ============================================================================
// ASSEMBLY
// ============================================================================

export function resolveBuildMode(release: boolean): BuildMode {
  return release ? 'release' : 'debug';
}

export function resolveCleanTarget(flags: CleanFlags, cwd: string): string {
  return path.resolve(cwd, flags.buildDir);
}

export function assembleBuildConfiguration(
  flags: BuildFlags,
  facts: HostFacts,
  cwd: string,
): BuildConfiguration {
  if (!path.isAbsolute(cwd)) {
    throw new ConfigurationError('cwd', `expected an absolute working directory, got ${cwd}`);
  }
  if (facts.targetTriple.length === 0) {
    throw new ConfigurationError('targetTriple', 'host reported an empty target triple');
  }

  const abs = (value: string): string => path.resolve(cwd, value);

  const buildRoot = abs(flags.buildDir);
  const mode = resolveBuildMode(flags.release);
  const targetDir = path.join(buildRoot, facts.targetTriple);
  const prefixes = flags.prefix.length > 0 ? flags.prefix.map(abs) : [DEFAULT_INSTALL_PREFIX];

  const dependency = Object.freeze({
    ...(flags.llbuildSourceDir ? { sourceDir: abs(flags.llbuildSourceDir) } : {}),
    buildDir: flags.llbuildBuildDir ? abs(flags.llbuildBuildDir) : path.join(targetDir, DEPENDENCY_DIR_NAME),
    prebuilt: flags.llbuildBuildDir !== undefined,
    linkFramework: flags.llbuildLinkFramework,
  });

  return Object.freeze({
    buildRoot,
    projectRoot: abs(flags.projectRoot ?? '.'),
    targetTriple: facts.targetTriple,
    targetDir,
    compilerPath: abs(facts.compilerPath),
    mode,
    binDir: path.join(targetDir, mode),
    bootstrapDir: path.join(targetDir, BOOTSTRAP_DIR_NAME),
    verbose: flags.verbose,
    ...(facts.sysroot ? { sysroot: facts.sysroot } : {}),
    dependency,
    installPrefixes: Object.freeze(prefixes),
    installLibrary: flags.installLibspm,
    reconfigure: flags.reconfigure,
  });
}
