import { describe, it, expect } from 'vitest';
import { EnvironmentResolver, normalizeCompilerPath } from '../environment.js';
import { ToolNotFoundError } from '../../core/errors.js';
import { createFakeHost, RecordingInvoker } from '../../test/fakes.js';

describe('normalizeCompilerPath', () => {
  it('rewrites a bare interpreter to its compiler sibling', () => {
    expect(normalizeCompilerPath('/opt/swift/usr/bin/swift')).toBe('/opt/swift/usr/bin/swiftc');
  });

  it('leaves other names alone', () => {
    expect(normalizeCompilerPath('/opt/swift/usr/bin/swiftc')).toBe('/opt/swift/usr/bin/swiftc');
    expect(normalizeCompilerPath('/opt/swift/usr/bin/swift-frontend')).toBe('/opt/swift/usr/bin/swift-frontend');
  });
});

describe('EnvironmentResolver.resolveCompiler', () => {
  it('prefers an explicit path and resolves it against the cwd', async () => {
    const invoker = new RecordingInvoker();
    const host = createFakeHost({ cwd: '/work', files: ['/work/toolchain/swiftc'], invoker });

    const resolver = new EnvironmentResolver(host);

    await expect(resolver.resolveCompiler('toolchain/swift')).resolves.toBe('/work/toolchain/swiftc');
    expect(invoker.calls).toHaveLength(0);
  });

  it('fails with ToolNotFoundError when the explicit path does not exist', async () => {
    const resolver = new EnvironmentResolver(createFakeHost());

    await expect(resolver.resolveCompiler('/missing/swiftc')).rejects.toBeInstanceOf(ToolNotFoundError);
  });

  it('follows the SWIFT_EXEC hint through its real path', async () => {
    const host = createFakeHost({
      env: { SWIFT_EXEC: '/usr/local/bin/swift' },
      links: { '/usr/local/bin/swift': '/opt/toolchain/usr/bin/swift' },
      files: ['/opt/toolchain/usr/bin/swiftc'],
    });

    const resolver = new EnvironmentResolver(host);

    await expect(resolver.resolveCompiler()).resolves.toBe('/opt/toolchain/usr/bin/swiftc');
  });

  it('searches PATH with which on Linux', async () => {
    const invoker = new RecordingInvoker().respondTo(['which', 'swiftc'], '/usr/bin/swiftc\n');
    const host = createFakeHost({ platform: 'linux', files: ['/usr/bin/swiftc'], invoker });

    const resolver = new EnvironmentResolver(host);

    await expect(resolver.resolveCompiler()).resolves.toBe('/usr/bin/swiftc');
    expect(invoker.calls.map((call) => call.command)).toEqual([['which', 'swiftc']]);
  });

  it('asks xcrun on macOS', async () => {
    const compiler = '/Applications/Xcode.app/Contents/Developer/Toolchains/XcodeDefault.xctoolchain/usr/bin/swiftc';
    const invoker = new RecordingInvoker().respondTo(['xcrun', '--find', 'swiftc'], compiler);
    const host = createFakeHost({ platform: 'darwin', files: [compiler], invoker });

    const resolver = new EnvironmentResolver(host);

    await expect(resolver.resolveCompiler()).resolves.toBe(compiler);
  });

  it('reports the missing compiler when discovery fails', async () => {
    const resolver = new EnvironmentResolver(createFakeHost({ platform: 'linux' }));

    await expect(resolver.resolveCompiler()).rejects.toThrow("unable to find 'swiftc' tool for bootstrap build");
  });
});

describe('EnvironmentResolver target and sysroot', () => {
  it('uses the fixed triple on macOS without running anything', async () => {
    const invoker = new RecordingInvoker();
    const resolver = new EnvironmentResolver(createFakeHost({ platform: 'darwin', invoker }));

    await expect(resolver.resolveTargetTriple()).resolves.toBe('x86_64-apple-macosx');
    expect(invoker.calls).toHaveLength(0);
  });

  it('asks clang for the triple elsewhere', async () => {
    const invoker = new RecordingInvoker().respondTo(['clang', '--print-target-triple'], 'aarch64-unknown-linux-gnu\n');
    const resolver = new EnvironmentResolver(createFakeHost({ platform: 'linux', invoker }));

    await expect(resolver.resolveTargetTriple()).resolves.toBe('aarch64-unknown-linux-gnu');
  });

  it('has no default sysroot off macOS', async () => {
    const invoker = new RecordingInvoker();
    const resolver = new EnvironmentResolver(createFakeHost({ platform: 'linux', invoker }));

    await expect(resolver.resolveDefaultSysroot()).resolves.toBeUndefined();
    expect(invoker.calls).toHaveLength(0);
  });

  it('queries the macOS SDK path once per resolver', async () => {
    const invoker = new RecordingInvoker().respondTo(
      ['xcrun', '--sdk', 'macosx', '--show-sdk-path'],
      '/SDKs/MacOSX.sdk\n',
    );
    const resolver = new EnvironmentResolver(createFakeHost({ platform: 'darwin', invoker }));

    await expect(resolver.resolveDefaultSysroot()).resolves.toBe('/SDKs/MacOSX.sdk');
    await expect(resolver.resolveDefaultSysroot()).resolves.toBe('/SDKs/MacOSX.sdk');
    expect(invoker.calls).toHaveLength(1);
  });

  it('collects host facts for the assembler', async () => {
    const invoker = new RecordingInvoker()
      .respondTo(['which', 'swiftc'], '/usr/bin/swiftc')
      .respondTo(['clang', '--print-target-triple'], 'x86_64-unknown-linux-gnu');
    const resolver = new EnvironmentResolver(
      createFakeHost({ platform: 'linux', files: ['/usr/bin/swiftc'], invoker }),
    );

    await expect(resolver.resolveHostFacts()).resolves.toEqual({
      platform: 'linux',
      compilerPath: '/usr/bin/swiftc',
      targetTriple: 'x86_64-unknown-linux-gnu',
    });
  });
});
