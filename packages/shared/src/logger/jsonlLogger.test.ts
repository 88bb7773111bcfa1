import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsonlLogger } from './jsonlLogger';
import type { RunStarted, WorkspaceCreated } from '../types/events';

const started: RunStarted = {
  schemaVersion: 1,
  timestamp: '2023-01-01T00:00:00Z',
  runId: 'run-1',
  type: 'RunStarted',
  payload: { target: 'thumbv7m-none-eabi', libraryRoot: '/work/lib' },
};

describe('JsonlLogger', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  async function logPath(): Promise<string> {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'examplecheck-logger-test-'));
    return path.join(tmpDir, 'events.jsonl');
  }

  it('appends events in JSONL format', async () => {
    const file = await logPath();
    const logger = new JsonlLogger(file);
    const created: WorkspaceCreated = {
      schemaVersion: 1,
      timestamp: '2023-01-01T00:00:01Z',
      runId: 'run-1',
      type: 'WorkspaceCreated',
      payload: { workspaceDir: '/tmp/ws' },
    };

    await logger.log(started);
    await logger.log(created);

    const lines = (await fs.readFile(file, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(started);
    expect(JSON.parse(lines[1])).toEqual(created);
  });

  it('writes the event and prints the message on trace', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const file = await logPath();
    const logger = new JsonlLogger(file);

    await logger.trace(started, 'Verifying examples');

    expect(infoSpy).toHaveBeenCalledWith('Verifying examples');
    const content = await fs.readFile(file, 'utf8');
    expect(content).toBe(JSON.stringify(started) + '\n');
  });

  it('sends trace messages to stderr when asked to', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const file = await logPath();

    await new JsonlLogger(file, { stderr: true }).trace(started, 'Verifying examples');

    expect(infoSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('Verifying examples');
  });

  it('does not throw if appending to the file fails', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'examplecheck-logger-test-'));
    // A directory path makes appendFile fail deterministically (EISDIR).
    const logger = new JsonlLogger(tmpDir);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(logger.log(started)).resolves.toBeUndefined();

    expect(errorSpy).toHaveBeenCalledWith(
      `Failed to write to event log at ${tmpDir}`,
      expect.any(Error),
    );
  });
});
