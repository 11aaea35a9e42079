import { describe, it, expect } from 'vitest';
import { buildEnvironmentOverlay, buildSelfHostFlags, dependencyCMakeArg } from '../overlay.js';
import { assembleBuildConfiguration, BuildFlagsSchema, parseFlags } from '../../config/assembler.js';
import type { BuildConfiguration } from '../../types.js';

function configure(overrides: Record<string, unknown> = {}): BuildConfiguration {
  return assembleBuildConfiguration(
    parseFlags(BuildFlagsSchema, overrides),
    { platform: 'linux', compilerPath: '/usr/bin/swiftc', targetTriple: 'x86_64-unknown-linux-gnu' },
    '/src/swiftpm',
  );
}

const TARGET = '/src/swiftpm/.build/x86_64-unknown-linux-gnu';

describe('buildEnvironmentOverlay', () => {
  it('points the self-hosted tool at local dependencies by default', () => {
    expect(buildEnvironmentOverlay(configure())).toEqual([
      ['SWIFT_EXEC', '/usr/bin/swiftc'],
      ['SWIFTPM_BUILD_DIR', '/src/swiftpm/.build'],
      ['SWIFTPM_PD_LIBS', `${TARGET}/bootstrap/pm`],
      ['SWIFTCI_USE_LOCAL_DEPS', '1'],
      ['DYLD_LIBRARY_PATH', `${TARGET}/bootstrap/lib:${TARGET}/llbuild/lib`],
      ['LD_LIBRARY_PATH', `${TARGET}/bootstrap/lib:${TARGET}/llbuild/lib`],
    ]);
  });

  it('switches to bootstrap mode for a framework dependency', () => {
    const overlay = new Map(buildEnvironmentOverlay(
      configure({ llbuildBuildDir: '/cache/llbuild', llbuildLinkFramework: true }),
    ));

    expect(overlay.get('DYLD_FRAMEWORK_PATH')).toBe('/cache/llbuild');
    expect(overlay.get('SWIFTPM_BOOTSTRAP')).toBe('1');
    expect(overlay.has('SWIFTCI_USE_LOCAL_DEPS')).toBe(false);
    expect(overlay.get('LD_LIBRARY_PATH')).toBe(`${TARGET}/bootstrap/lib:/cache/llbuild/lib`);
  });
});

describe('buildSelfHostFlags', () => {
  it('only disables indexing in debug mode', () => {
    expect(buildSelfHostFlags(configure())).toEqual(['--disable-index-store']);
  });

  it('adds testable release flags in release mode', () => {
    expect(buildSelfHostFlags(configure({ release: true }))).toEqual([
      '--disable-index-store',
      '-Xswiftc',
      '-enable-testing',
      '--configuration',
      'release',
    ]);
  });
});

describe('dependencyCMakeArg', () => {
  it('names the CMake package directory of a conventional build', () => {
    expect(dependencyCMakeArg(configure())).toBe(`-DLLBuild_DIR=${TARGET}/llbuild/cmake/modules`);
  });

  it('names the framework directory when linking a framework', () => {
    expect(dependencyCMakeArg(configure({ llbuildBuildDir: '/cache/llbuild', llbuildLinkFramework: true })))
      .toBe('-DLLBUILD_FRAMEWORK=/cache/llbuild');
  });
});
