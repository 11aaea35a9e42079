/**
 * Centralized Vitest Setup for spm-bootstrap
 *
 * The compiler override is read from the real environment by the CLI. Strip it
 * so a developer's SWIFT_EXEC cannot change which lookup path a test takes.
 */

import { afterEach, beforeEach } from 'vitest';
import { COMPILER_ENV_VAR } from './src/config/defaults.js';

let savedCompiler: string | undefined;

beforeEach(() => {
  savedCompiler = process.env[COMPILER_ENV_VAR];
  delete process.env[COMPILER_ENV_VAR];
});

afterEach(() => {
  if (savedCompiler === undefined) {
    delete process.env[COMPILER_ENV_VAR];
  } else {
    process.env[COMPILER_ENV_VAR] = savedCompiler;
  }
});
