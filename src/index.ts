/**
 * @fileoverview spm-bootstrap public API
 *
 * The CLI is a thin layer over these modules; they can also be driven
 * programmatically, e.g. from a CI script.
 *
 * @packageDocumentation
 */

export type {
  BuildConfiguration,
  BuildMode,
  CommandName,
  CommandVector,
  DependencyBuildState,
  DependencySettings,
  EnvironmentOverlay,
  HostFacts,
  PipelineState,
  StageName,
  StageRecord,
  TestOptions,
} from './types.js';

export {
  BootstrapError,
  ConfigurationError,
  FilesystemError,
  ProcessError,
  ToolNotFoundError,
  isBootstrapError,
  renderCommand,
  type ProcessFailure,
} from './core/errors.js';

export {
  assembleBuildConfiguration,
  parseFlags,
  resolveBuildMode,
  resolveCleanTarget,
  BuildFlagsSchema,
  CleanFlagsSchema,
  TestFlagsSchema,
  type BuildFlags,
  type CleanFlags,
  type TestFlags,
} from './config/assembler.js';

export { EnvironmentResolver, createNodeHost, normalizeCompilerPath, type HostEnvironment } from './host/environment.js';
export { ExecaProcessInvoker, type ProcessInvoker, type RunOptions } from './process/invoker.js';
export { nodeFileSystem, type BuildFileSystem } from './fs/operations.js';
export { StagedBuildDriver, cleanBuildRoot, type DriverDependencies } from './pipeline/driver.js';
export { buildEnvironmentOverlay, buildSelfHostFlags } from './pipeline/overlay.js';
export { runCli, DEFAULT_COMMAND } from './cli/dispatch.js';
export { SPM_BOOTSTRAP_VERSION } from './config/defaults.js';
