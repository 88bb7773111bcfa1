import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TimeoutError, ToolError } from '@examplecheck/shared';
import { CommandRunner } from './runner';

const { execaMock } = vi.hoisted(() => ({ execaMock: vi.fn() }));

vi.mock('execa', () => ({ execa: execaMock }));

function execaResult(overrides: Record<string, unknown>) {
  return {
    command: 'xargo check --example blink --target thumbv7m-none-eabi',
    escapedCommand: 'xargo check --example blink --target thumbv7m-none-eabi',
    exitCode: 0,
    stdout: '',
    stderr: '',
    failed: false,
    timedOut: false,
    killed: false,
    isCanceled: false,
    cwd: '/tmp/ws',
    ...overrides,
  };
}

describe('CommandRunner', () => {
  const req = {
    command: 'xargo',
    args: ['check', '--example', 'blink', '--target', 'thumbv7m-none-eabi'],
    cwd: '/tmp/ws',
  };

  beforeEach(() => {
    execaMock.mockReset();
  });

  it('runs the command in the given directory with inherited stdio', async () => {
    execaMock.mockResolvedValue(execaResult({}));

    const result = await new CommandRunner().run(req);

    expect(result.exitCode).toBe(0);
    expect(execaMock).toHaveBeenCalledWith(
      'xargo',
      ['check', '--example', 'blink', '--target', 'thumbv7m-none-eabi'],
      expect.objectContaining({ cwd: '/tmp/ws', stdio: 'inherit', reject: false }),
    );
  });

  it('routes the command stdout to stderr when asked to', async () => {
    execaMock.mockResolvedValue(execaResult({}));

    await new CommandRunner({ stdoutToStderr: true }).run(req);

    expect(execaMock).toHaveBeenCalledWith(
      'xargo',
      expect.any(Array),
      expect.objectContaining({ stdio: ['inherit', process.stderr, 'inherit'] }),
    );
  });

  it('passes the timeout through', async () => {
    execaMock.mockResolvedValue(execaResult({}));

    await new CommandRunner().run({ ...req, timeoutMs: 5000 });

    expect(execaMock).toHaveBeenCalledWith(
      'xargo',
      expect.any(Array),
      expect.objectContaining({ timeout: 5000 }),
    );
  });

  it('returns a non-zero exit code as a result', async () => {
    execaMock.mockResolvedValue(execaResult({ exitCode: 101, failed: true }));

    const result = await new CommandRunner().run(req);

    expect(result.exitCode).toBe(101);
  });

  it('throws TimeoutError when the command times out', async () => {
    execaMock.mockResolvedValue(
      execaResult({ failed: true, timedOut: true, signal: 'SIGTERM', killed: true }),
    );

    await expect(new CommandRunner().run({ ...req, timeoutMs: 10 })).rejects.toBeInstanceOf(
      TimeoutError,
    );
  });

  it('throws ToolError when the command is killed by a signal', async () => {
    execaMock.mockResolvedValue(
      execaResult({ failed: true, signal: 'SIGKILL', killed: true }),
    );

    await expect(new CommandRunner().run(req)).rejects.toThrow(
      'Command was killed by SIGKILL: xargo check --example blink --target thumbv7m-none-eabi',
    );
  });

  it('throws ToolError when the command cannot start', async () => {
    const spawnFailure = execaResult({ failed: true });
    Reflect.deleteProperty(spawnFailure, 'exitCode');
    execaMock.mockResolvedValue(spawnFailure);

    await expect(new CommandRunner().run(req)).rejects.toBeInstanceOf(ToolError);
  });
});
