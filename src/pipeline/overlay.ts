/**
 * @fileoverview Environment overlay and flags for the self-hosted tool
 *
 * The first-generation binary needs to find the freshly built runtime
 * libraries and be told which compiler and build directory to use. These are
 * passed to its child process only.
 */

import * as path from 'node:path';
import { COMPILER_ENV_VAR, RUNTIME_LIBS_DIR_NAME } from '../config/defaults.js';
import type { BuildConfiguration, EnvironmentOverlay } from '../types.js';

export function buildEnvironmentOverlay(config: BuildConfiguration): EnvironmentOverlay {
  const dependencyDir = config.dependency.buildDir;
  const overlay: Array<readonly [string, string]> = [
    [COMPILER_ENV_VAR, config.compilerPath],
    ['SWIFTPM_BUILD_DIR', config.buildRoot],
    ['SWIFTPM_PD_LIBS', path.join(config.bootstrapDir, RUNTIME_LIBS_DIR_NAME)],
  ];

  if (config.dependency.linkFramework) {
    overlay.push(['DYLD_FRAMEWORK_PATH', dependencyDir]);
    // The framework layout is only understood in bootstrap mode.
    overlay.push(['SWIFTPM_BOOTSTRAP', '1']);
  } else {
    overlay.push(['SWIFTCI_USE_LOCAL_DEPS', '1']);
  }

  const libraryPath = [
    path.join(config.bootstrapDir, 'lib'),
    path.join(dependencyDir, 'lib'),
  ].join(':');
  overlay.push(['DYLD_LIBRARY_PATH', libraryPath]);
  overlay.push(['LD_LIBRARY_PATH', libraryPath]);

  return overlay;
}

export function buildSelfHostFlags(config: BuildConfiguration): string[] {
  // No need for indexing while building.
  const flags = ['--disable-index-store'];
  if (config.mode === 'release') {
    flags.push('-Xswiftc', '-enable-testing', '--configuration', 'release');
  }
  return flags;
}

/**
 * `-DLLBUILD_FRAMEWORK=<dir>` for a framework bundle, otherwise the CMake
 * package directory of a conventional build.
 */
export function dependencyCMakeArg(config: BuildConfiguration): string {
  const buildDir = config.dependency.buildDir;
  if (config.dependency.linkFramework) {
    return `-DLLBUILD_FRAMEWORK=${buildDir}`;
  }
  return `-DLLBuild_DIR=${path.join(buildDir, 'cmake/modules')}`;
}
