/**
 * @fileoverview Shared types for the bootstrap pipeline
 *
 * @packageDocumentation
 */

/** A command and its arguments. Never joined into a shell string for execution. */
export type CommandVector = readonly string[];

export type BuildMode = 'debug' | 'release';

export type CommandName = 'clean' | 'build' | 'test' | 'install';

/**
 * Where the build-acceleration dependency (llbuild) comes from and goes to.
 */
export interface DependencySettings {
  /** Source tree; resolved lazily when Stage 1 runs if not given. */
  readonly sourceDir?: string;
  readonly buildDir: string;
  /** True when the caller passed an existing build, which skips Stage 1. */
  readonly prebuilt: boolean;
  /** Link against a framework bundle rather than a library + headers pair. */
  readonly linkFramework: boolean;
}

export interface BuildConfiguration {
  readonly buildRoot: string;
  readonly projectRoot: string;
  readonly targetTriple: string;
  /** `buildRoot/targetTriple` */
  readonly targetDir: string;
  readonly compilerPath: string;
  readonly mode: BuildMode;
  /** `buildRoot/targetTriple/mode` */
  readonly binDir: string;
  /** CMake staging directory for the first-generation tool. */
  readonly bootstrapDir: string;
  readonly verbose: boolean;
  readonly sysroot?: string;
  readonly dependency: DependencySettings;
  readonly installPrefixes: readonly string[];
  readonly installLibrary: boolean;
  /** Ignore an existing configuration descriptor and re-run CMake. */
  readonly reconfigure: boolean;
}

export interface DependencyBuildState {
  sourceDir: string;
  buildDir: string;
  configured: boolean;
}

/** Ordered `[name, value]` pairs handed to one child process. */
export type EnvironmentOverlay = ReadonlyArray<readonly [string, string]>;

export interface HostFacts {
  platform: NodeJS.Platform;
  compilerPath: string;
  targetTriple: string;
  sysroot?: string;
}

export type PipelineState =
  | 'start'
  | 'dependency-built'
  | 'tool-bootstrapped'
  | 'tool-self-built'
  | 'tested'
  | 'installed'
  | 'done'
  | 'cleaned'
  | 'failed';

export type StageName = 'dependency' | 'native-bootstrap' | 'self-build' | 'test' | 'install';

export interface StageRecord {
  stage: StageName;
  durationMs: number;
  /** Whether the configure step ran (CMake stages only). */
  configured?: boolean;
}

export interface TestOptions {
  parallel: boolean;
  filters: readonly string[];
}
