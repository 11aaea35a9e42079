/**
 * @fileoverview Defaults, well-known names and environment variables
 */

export const PROGRAM_NAME = 'spm-bootstrap';

export const DEFAULT_BUILD_DIR = '.build';
export const DEFAULT_INSTALL_PREFIX = '/usr/local';

/** Compiler override read once while resolving host facts. */
export const COMPILER_ENV_VAR = 'SWIFT_EXEC';

export const COMPILER_NAME = 'swiftc';
export const INTERPRETER_NAME = 'swift';

export const DARWIN_TARGET_TRIPLE = 'x86_64-apple-macosx';

/** Written by CMake once a build directory is configured. */
export const CONFIGURATION_DESCRIPTOR = 'CMakeCache.txt';

/** CMake file-API query that makes CMake emit its codemodel for llbuild. */
export const CODEMODEL_QUERY_DIR = '.cmake/api/v1/query';
export const CODEMODEL_QUERY_FILE = 'codemodel-v2';

export const DEPENDENCY_DIR_NAME = 'llbuild';
export const BOOTSTRAP_DIR_NAME = 'bootstrap';
export const RUNTIMES_RELATIVE_DIR = 'lib/swift';
export const RUNTIME_LIBS_DIR_NAME = 'pm';

export const SELF_BUILD_TOOL = 'bin/swift-build';
export const TEST_RUNNER_TOOL = 'swift-test';

export const SPM_BOOTSTRAP_VERSION = '0.1.0';
