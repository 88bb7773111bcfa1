import { ConsoleLogger } from './consoleLogger';
import type { RunStarted } from '../types/events';

const event: RunStarted = {
  schemaVersion: 1,
  timestamp: '2026-02-18T00:00:00.000Z',
  runId: 'run-1',
  type: 'RunStarted',
  payload: { target: 'thumbv7m-none-eabi', libraryRoot: '/work/lib' },
};

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints trace messages and keeps events quiet unless verbose', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.trace(event, 'hello');

    expect(infoSpy).toHaveBeenCalledWith('hello');
    expect(debugSpy).not.toHaveBeenCalled();
  });

  it('prints events as JSON in verbose mode', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    const logger = new ConsoleLogger({ verbose: true });
    logger.log(event);

    expect(debugSpy).toHaveBeenCalledWith(JSON.stringify(event));
  });

  it('writes debug only in verbose mode and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    new ConsoleLogger().debug('hidden');
    expect(debugSpy).not.toHaveBeenCalled();

    const logger = new ConsoleLogger({ verbose: true });
    logger.debug('d');
    logger.info('i');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('keeps stdout free when writing to stderr', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger({ verbose: true, stderr: true });
    logger.trace(event, 'hello');
    logger.debug('d');

    expect(infoSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
    expect(errorSpy.mock.calls).toEqual([[JSON.stringify(event)], ['hello'], ['d']]);
  });
});
