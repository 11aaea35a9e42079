/**
 * @fileoverview Environment Resolver
 *
 * Answers the host questions the pipeline needs: which compiler to use, the
 * target triple, and (on macOS) the default SDK root. All lookups go through a
 * {@link HostEnvironment} so tests can substitute a fake host. Answers that
 * cost a process launch are memoized per resolver instance.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  COMPILER_ENV_VAR,
  COMPILER_NAME,
  DARWIN_TARGET_TRIPLE,
  INTERPRETER_NAME,
} from '../config/defaults.js';
import { ToolNotFoundError } from '../core/errors.js';
import type { ProcessInvoker } from '../process/invoker.js';
import type { CommandVector, HostFacts } from '../types.js';

export interface HostEnvironment {
  readonly platform: NodeJS.Platform;
  cwd(): string;
  getEnv(name: string): string | undefined;
  exists(target: string): boolean;
  /** Canonical path; throws when the path does not exist. */
  realpath(target: string): string;
  /** Run a command and return its trimmed stdout. */
  capture(command: CommandVector): Promise<string>;
}

export function createNodeHost(invoker: ProcessInvoker): HostEnvironment {
  return {
    platform: process.platform,
    cwd: () => process.cwd(),
    getEnv: (name) => process.env[name],
    exists: (target) => fs.existsSync(target),
    realpath: (target) => fs.realpathSync(target),
    capture: (command) => invoker.capture(command),
  };
}

const COMPILER_NOT_FOUND = `unable to find '${COMPILER_NAME}' tool for bootstrap build`;

/**
 * A bare interpreter name (`.../swift`) is rewritten to its compiler sibling
 * (`.../swiftc`). Anything else is returned unchanged.
 */
export function normalizeCompilerPath(candidate: string): string {
  return path.basename(candidate) === INTERPRETER_NAME ? `${candidate}c` : candidate;
}

function memoize<T>(compute: () => Promise<T>): () => Promise<T> {
  let cached: Promise<T> | undefined;
  return () => {
    cached ??= compute();
    return cached;
  };
}

export class EnvironmentResolver {
  readonly resolveTargetTriple: () => Promise<string>;
  readonly resolveDefaultSysroot: () => Promise<string | undefined>;

  constructor(private readonly host: HostEnvironment) {
    this.resolveTargetTriple = memoize(() => this.queryTargetTriple());
    this.resolveDefaultSysroot = memoize(() => this.querySysroot());
  }

  get platform(): NodeJS.Platform {
    return this.host.platform;
  }

  /**
   * Precedence: the explicit path, then the `SWIFT_EXEC` hint, then
   * `xcrun --find` on macOS or `which` elsewhere.
   */
  async resolveCompiler(explicitPath?: string): Promise<string> {
    const candidate = await this.findCompilerCandidate(explicitPath);
    if (!candidate || !this.host.exists(candidate)) {
      throw new ToolNotFoundError(COMPILER_NAME, COMPILER_NOT_FOUND);
    }
    return candidate;
  }

  async resolveHostFacts(explicitCompiler?: string): Promise<HostFacts> {
    const compilerPath = await this.resolveCompiler(explicitCompiler);
    const targetTriple = await this.resolveTargetTriple();
    const sysroot = await this.resolveDefaultSysroot();
    return {
      platform: this.host.platform,
      compilerPath,
      targetTriple,
      ...(sysroot ? { sysroot } : {}),
    };
  }

  private async findCompilerCandidate(explicitPath?: string): Promise<string | undefined> {
    if (explicitPath) {
      return normalizeCompilerPath(path.resolve(this.host.cwd(), explicitPath));
    }

    const hint = this.host.getEnv(COMPILER_ENV_VAR);
    if (hint) {
      try {
        return normalizeCompilerPath(this.host.realpath(hint));
      } catch {
        return undefined;
      }
    }

    const lookup: CommandVector = this.host.platform === 'darwin'
      ? ['xcrun', '--find', COMPILER_NAME]
      : ['which', COMPILER_NAME];
    try {
      const found = (await this.host.capture(lookup)).trim();
      return found.length > 0 ? found : undefined;
    } catch {
      return undefined;
    }
  }

  private async queryTargetTriple(): Promise<string> {
    if (this.host.platform === 'darwin') {
      return DARWIN_TARGET_TRIPLE;
    }
    return (await this.host.capture(['clang', '--print-target-triple'])).trim();
  }

  private async querySysroot(): Promise<string | undefined> {
    if (this.host.platform !== 'darwin') {
      return undefined;
    }
    const sdk = (await this.host.capture(['xcrun', '--sdk', 'macosx', '--show-sdk-path'])).trim();
    return sdk.length > 0 ? sdk : undefined;
  }
}
