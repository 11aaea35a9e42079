/**
 * @fileoverview Staged Build Driver
 *
 * Runs the bootstrap as a linear pipeline:
 *
 *   start → dependency-built → tool-bootstrapped → tool-self-built → [tested | installed] → done
 *
 * 1. dependency        - llbuild via CMake + Ninja (skipped for a prebuilt dependency)
 * 2. native-bootstrap  - the package manager via CMake + Ninja, linked against (1)
 * 3. self-build        - the package manager rebuilt by the binary from (2)
 * 4. test              - the self-built test runner (test command only)
 *
 * Any failure moves the driver to `failed` and propagates; later stages never
 * run. A driver instance runs one pipeline.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import {
  CODEMODEL_QUERY_DIR,
  CODEMODEL_QUERY_FILE,
  CONFIGURATION_DESCRIPTOR,
  DEPENDENCY_DIR_NAME,
  RUNTIMES_RELATIVE_DIR,
  RUNTIME_LIBS_DIR_NAME,
  SELF_BUILD_TOOL,
  TEST_RUNNER_TOOL,
} from '../config/defaults.js';
import { ConfigurationError, renderCommand, ToolNotFoundError } from '../core/errors.js';
import { nodeFileSystem, type BuildFileSystem } from '../fs/operations.js';
import type { ProcessInvoker } from '../process/invoker.js';
import { logInfo, logNote } from '../telemetry/logger.js';
import type {
  BuildConfiguration,
  CommandVector,
  DependencyBuildState,
  PipelineState,
  StageName,
  StageRecord,
  TestOptions,
} from '../types.js';
import { buildEnvironmentOverlay, buildSelfHostFlags, dependencyCMakeArg } from './overlay.js';

export interface DriverDependencies {
  invoker: ProcessInvoker;
  fs?: BuildFileSystem;
  now?: () => number;
}

/**
 * Remove the entire build root. A missing root is not an error. In verbose
 * mode the removal is echoed like any other command.
 */
export async function cleanBuildRoot(
  buildRoot: string,
  fs: BuildFileSystem = nodeFileSystem,
  verbose = false,
): Promise<PipelineState> {
  logNote('Cleaning');
  if (verbose) {
    logInfo(renderCommand(['rm', '-rf', buildRoot]));
  }
  await fs.removeTree(buildRoot);
  return 'cleaned';
}

export class StagedBuildDriver {
  private currentState: PipelineState = 'start';
  private readonly records: StageRecord[] = [];
  /** Build directories configured by this driver, so CMake runs at most once per directory. */
  private readonly configuredDirs = new Set<string>();
  private readonly invoker: ProcessInvoker;
  private readonly fs: BuildFileSystem;
  private readonly now: () => number;

  constructor(
    private readonly config: BuildConfiguration,
    deps: DriverDependencies,
  ) {
    this.invoker = deps.invoker;
    this.fs = deps.fs ?? nodeFileSystem;
    this.now = deps.now ?? Date.now;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  get history(): readonly StageRecord[] {
    return this.records;
  }

  /** Stages 1-3. */
  async build(): Promise<void> {
    await this.execute(() => this.runBuildStages());
  }

  /** Stages 1-3, then the self-built test runner. */
  async test(options: TestOptions): Promise<void> {
    await this.execute(async () => {
      await this.runBuildStages();
      await this.runStage('test', 'tested', async () => {
        logNote('Testing');
        await this.callSelfHosted(this.testCommand(options));
      });
    });
  }

  /** Stages 1-3, then `ninja install` from the CMake staging directory. */
  async install(): Promise<void> {
    await this.execute(async () => {
      await this.runBuildStages();
      await this.runStage('install', 'installed', async () => {
        logNote('Installing');
        await this.invoker.run(['ninja', 'install'], { cwd: this.config.bootstrapDir });
      });
    });
  }

  testCommand(options: TestOptions): string[] {
    const command = [path.join(this.config.binDir, TEST_RUNNER_TOOL)];
    if (options.parallel) {
      command.push('--parallel');
    }
    for (const filter of options.filters) {
      command.push('--filter', filter);
    }
    return command;
  }

  /**
   * Read the on-disk state of a CMake build directory.
   */
  async probeBuildState(sourceDir: string, buildDir: string): Promise<DependencyBuildState> {
    const configured = await this.fs.isRegularFile(path.join(buildDir, CONFIGURATION_DESCRIPTOR));
    return { sourceDir, buildDir, configured };
  }

  /**
   * Configure `buildDir` with CMake unless a configuration descriptor is
   * already there, then compile with Ninja.
   *
   * @returns whether the configure step ran
   */
  async buildWithCMake(cmakeArgs: readonly string[], sourceDir: string, buildDir: string): Promise<boolean> {
    const state = await this.probeBuildState(sourceDir, buildDir);
    const needsConfigure = !this.configuredDirs.has(buildDir)
      && (!state.configured || this.config.reconfigure);

    if (needsConfigure) {
      const swiftFlags = this.config.sysroot ? `-sdk ${this.config.sysroot}` : '';
      const configure: CommandVector = [
        'cmake', '-G', 'Ninja',
        '-DCMAKE_BUILD_TYPE:=Debug',
        `-DCMAKE_Swift_FLAGS=${swiftFlags}`,
        `-DCMAKE_Swift_COMPILER:=${this.config.compilerPath}`,
        ...cmakeArgs,
        sourceDir,
      ];
      await this.fs.mkdirP(buildDir);
      await this.invoker.run(configure, { cwd: buildDir });
      this.configuredDirs.add(buildDir);
    }

    const compile = this.config.verbose ? ['ninja', '-v'] : ['ninja'];
    await this.invoker.run(compile, { cwd: buildDir });
    return needsConfigure;
  }

  private async execute(pipeline: () => Promise<void>): Promise<void> {
    if (this.currentState !== 'start') {
      throw new ConfigurationError('pipeline', `driver already ran (state: ${this.currentState})`);
    }
    try {
      await pipeline();
      this.currentState = 'done';
    } catch (error) {
      this.currentState = 'failed';
      throw error;
    }
  }

  private async runBuildStages(): Promise<void> {
    // Locate the dependency before anything runs, so a missing checkout fails fast.
    const dependencySource = this.config.dependency.prebuilt
      ? undefined
      : await this.locateDependencySource();

    if (dependencySource !== undefined) {
      await this.runStage('dependency', 'dependency-built', () => this.buildDependency(dependencySource));
    }
    await this.runStage('native-bootstrap', 'tool-bootstrapped', () => this.buildWithNativeTools());
    await this.runStage('self-build', 'tool-self-built', () => this.buildWithSelf());
  }

  private async runStage(
    stage: StageName,
    next: PipelineState,
    body: () => Promise<boolean | void>,
  ): Promise<void> {
    const startedAt = this.now();
    const configured = await body();
    const record: StageRecord = { stage, durationMs: this.now() - startedAt };
    if (typeof configured === 'boolean') {
      record.configured = configured;
    }
    this.records.push(record);
    this.currentState = next;
  }

  private async locateDependencySource(): Promise<string> {
    const sourceDir = this.config.dependency.sourceDir
      ?? path.resolve(this.config.projectRoot, '..', DEPENDENCY_DIR_NAME);
    if (await this.fs.isDirectory(sourceDir)) {
      return sourceDir;
    }
    logNote('clone llbuild next to swiftpm directory; see development docs');
    throw new ToolNotFoundError(DEPENDENCY_DIR_NAME, `unable to find llbuild source directory at ${sourceDir}`);
  }

  private async buildDependency(sourceDir: string): Promise<boolean> {
    logNote('Building llbuild');
    const buildDir = this.config.dependency.buildDir;

    const queryDir = path.join(buildDir, CODEMODEL_QUERY_DIR);
    await this.fs.mkdirP(queryDir);
    await this.fs.touchFile(path.join(queryDir, CODEMODEL_QUERY_FILE));

    const cmakeArgs = [
      '-DCMAKE_C_COMPILER:=clang',
      '-DCMAKE_CXX_COMPILER:=clang++',
      '-DLLBUILD_SUPPORT_BINDINGS:=Swift',
    ];
    if (this.config.sysroot) {
      cmakeArgs.push(`-DSQLite3_INCLUDE_DIR=${this.config.sysroot}/usr/include`);
    }
    return this.buildWithCMake(cmakeArgs, sourceDir, buildDir);
  }

  private async buildWithNativeTools(): Promise<boolean> {
    logNote('Building SwiftPM (with CMake)');
    const config = this.config;
    const configured = await this.buildWithCMake([
      dependencyCMakeArg(config),
      `-DSWIFTPM_BUILD_DIR=${config.binDir}`,
      '-DUSE_VENDORED_TSC=ON',
      `-DCMAKE_INSTALL_PREFIX=${config.installPrefixes[0]}`,
      `-DINSTALL_LIBSWIFTPM=${config.installLibrary ? 'ON' : 'OFF'}`,
    ], config.projectRoot, config.bootstrapDir);

    await this.linkRuntimes();
    return configured;
  }

  /**
   * `targetDir/lib/swift/pm → bootstrapDir/pm`, so the first-generation binary
   * finds its runtime libraries without extra environment.
   */
  private async linkRuntimes(): Promise<void> {
    const runtimesDir = path.join(this.config.targetDir, RUNTIMES_RELATIVE_DIR);
    await this.fs.mkdirP(runtimesDir);
    await this.fs.symlinkForce(path.join(this.config.bootstrapDir, RUNTIME_LIBS_DIR_NAME), runtimesDir);
  }

  private async buildWithSelf(): Promise<void> {
    logNote('Building SwiftPM (with swift-build)');
    await this.callSelfHosted([
      path.join(this.config.bootstrapDir, SELF_BUILD_TOOL),
      // Tests are always built here so the test command can reuse them.
      '--build-tests',
    ]);
  }

  private async callSelfHosted(command: readonly string[]): Promise<void> {
    await this.invoker.run([...command, ...buildSelfHostFlags(this.config)], {
      cwd: this.config.projectRoot,
      env: buildEnvironmentOverlay(this.config),
    });
  }
}
