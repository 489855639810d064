import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger } from './consoleLogger';
import type { AttemptStarted } from '../types/events';

const event: AttemptStarted = {
  schemaVersion: 1,
  timestamp: '2026-01-01T00:00:00.000Z',
  runId: 'run-1',
  type: 'AttemptStarted',
  payload: { attempt: 1 },
};

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs events as JSON at debug level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = new ConsoleLogger('debug');
    logger.log(event);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(event));
  });

  it('keeps events out of the console at the default level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.log(event);
    logger.debug('hidden');

    expect(logSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
  });

  it('writes debug/info/warn and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger('debug');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('drops info at warn level but still reports errors', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger('warn');
    logger.info('quiet');
    logger.error(new Error('loud'));

    expect(infoSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ attempt: 1 }).child({ stage: 'plan' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[attempt=1 stage=plan] hello');

    logger.child({ round: 3 }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[round=3] warn');
  });
});
