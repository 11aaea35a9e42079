#!/usr/bin/env node
/**
 * @fileoverview spm-bootstrap CLI entry point
 *
 * Commands:
 *   spm-bootstrap build     - llbuild, then the package manager with CMake, then with itself
 *   spm-bootstrap test      - build, then run the self-built tests
 *   spm-bootstrap install   - build, then install the CMake products
 *   spm-bootstrap clean     - remove the build directory
 *
 * @packageDocumentation
 */

import { runCli } from './dispatch.js';
import { formatFailureLine } from './errors.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(formatFailureLine(error));
    process.exitCode = 1;
  });
