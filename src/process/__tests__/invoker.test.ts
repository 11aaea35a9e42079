import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { execa } from 'execa';
import { ExecaProcessInvoker, overlayToEnv } from '../invoker.js';
import { ConfigurationError, ProcessError } from '../../core/errors.js';

vi.mock('execa', () => ({ execa: vi.fn() }));

const execaMock = vi.mocked(execa);

interface ResultFields {
  exitCode?: number;
  failed?: boolean;
  stdout?: string;
  signal?: string;
  cause?: unknown;
  shortMessage?: string;
}

function buildExecaResult(options: ResultFields) {
  return {
    exitCode: options.exitCode,
    failed: options.failed ?? options.exitCode !== 0,
    stdout: options.stdout ?? '',
    stderr: '',
    signal: options.signal,
    cause: options.cause,
    shortMessage: options.shortMessage,
  } as unknown as Awaited<ReturnType<typeof execa>>;
}

describe('ExecaProcessInvoker', () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    execaMock.mockReset();
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  it('streams the command with its cwd and environment overlay', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ exitCode: 0 }));
    const invoker = new ExecaProcessInvoker();

    await invoker.run(['ninja', '-v'], {
      cwd: '/build',
      env: [['LD_LIBRARY_PATH', '/build/lib'], ['SWIFTCI_USE_LOCAL_DEPS', '1']],
    });

    expect(execaMock).toHaveBeenCalledWith('ninja', ['-v'], {
      cwd: '/build',
      env: { LD_LIBRARY_PATH: '/build/lib', SWIFTCI_USE_LOCAL_DEPS: '1' },
      stdio: 'inherit',
      reject: false,
    });
  });

  it('raises a ProcessError naming the command on a nonzero exit', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ exitCode: 2 }));
    const invoker = new ExecaProcessInvoker();

    const failure = invoker.run(['cmake', '-G', 'Ninja', '/src/my project'], { cwd: '/build' });

    await expect(failure).rejects.toBeInstanceOf(ProcessError);
    await expect(failure).rejects.toThrow(
      'command failed with exit status 2: cmake -G Ninja "/src/my project"',
    );
  });

  it('reports a child terminated by a signal', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ failed: true, signal: 'SIGKILL' }));
    const invoker = new ExecaProcessInvoker();

    await expect(invoker.run(['sh', '-c', 'kill -9 $$'])).rejects.toMatchObject({
      exitStatus: null,
      signal: 'SIGKILL',
      message: 'command was terminated by SIGKILL: sh -c "kill -9 $$"',
    });
  });

  it('keeps the reason a missing tool could not be started', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({
      failed: true,
      cause: new Error('spawn no-such-tool ENOENT'),
      shortMessage: 'Command failed with ENOENT: no-such-tool',
    }));
    const invoker = new ExecaProcessInvoker();

    await expect(invoker.run(['no-such-tool'])).rejects.toMatchObject({
      exitStatus: null,
      reason: 'spawn no-such-tool ENOENT',
      message: 'command could not be started (spawn no-such-tool ENOENT): no-such-tool',
    });
  });

  it('falls back to the short message when there is no cause', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ failed: true, shortMessage: 'Command was canceled: ninja' }));
    const invoker = new ExecaProcessInvoker();

    await expect(invoker.run(['ninja'])).rejects.toThrow(
      'command could not be started (Command was canceled: ninja): ninja',
    );
  });

  it('reports a signal from capture as well', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ failed: true, signal: 'SIGTERM' }));
    const invoker = new ExecaProcessInvoker();

    await expect(invoker.capture(['clang', '--print-target-triple'])).rejects.toThrow(
      'command was terminated by SIGTERM: clang --print-target-triple',
    );
  });

  it('still reports options execa rejects outright', async () => {
    execaMock.mockRejectedValueOnce(new TypeError('The "cwd" option must be a string'));
    const invoker = new ExecaProcessInvoker();

    await expect(invoker.run(['cmake'])).rejects.toMatchObject({
      exitStatus: null,
      message: 'command could not be started (The "cwd" option must be a string): cmake',
    });
  });

  it('returns trimmed stdout from capture', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ exitCode: 0, stdout: 'x86_64-unknown-linux-gnu\n' }));
    const invoker = new ExecaProcessInvoker();

    await expect(invoker.capture(['clang', '--print-target-triple'])).resolves.toBe('x86_64-unknown-linux-gnu');
    expect(execaMock).toHaveBeenCalledWith('clang', ['--print-target-triple'], {
      cwd: undefined,
      env: undefined,
      reject: false,
    });
  });

  it('fails capture on a nonzero exit', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ exitCode: 1 }));
    const invoker = new ExecaProcessInvoker();

    await expect(invoker.capture(['which', 'swiftc'])).rejects.toThrow(
      'command failed with exit status 1: which swiftc',
    );
  });

  it('echoes commands only in verbose mode', async () => {
    execaMock.mockResolvedValue(buildExecaResult({ exitCode: 0 }));

    await new ExecaProcessInvoker().run(['ninja']);
    expect(consoleErrorSpy).not.toHaveBeenCalled();

    await new ExecaProcessInvoker({ verbose: true }).run(['ninja', '-v']);
    expect(consoleErrorSpy).toHaveBeenCalledWith('ninja -v');
  });

  it('rejects an empty command vector', async () => {
    await expect(new ExecaProcessInvoker().run([])).rejects.toBeInstanceOf(ConfigurationError);
    expect(execaMock).not.toHaveBeenCalled();
  });
});

describe('overlayToEnv', () => {
  it('returns undefined for an empty overlay', () => {
    expect(overlayToEnv(undefined)).toBeUndefined();
    expect(overlayToEnv([])).toBeUndefined();
  });

  it('lets a later assignment win', () => {
    expect(overlayToEnv([['A', '1'], ['A', '2']])).toEqual({ A: '2' });
  });
});
