import { ConsoleLogger, SilentLogger } from './consoleLogger';
import type { FileFailed } from '../types/events';

const event: FileFailed = {
  schemaVersion: 1,
  timestamp: '2026-02-18T00:00:00.000Z',
  runId: 'run-1',
  type: 'FileFailed',
  payload: { path: 'src/a.py', stage: 'Read', reason: 'EACCES' },
};

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes events to stderr only at debug level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    new ConsoleLogger().log(event);
    expect(errorSpy).not.toHaveBeenCalled();

    const logger = new ConsoleLogger({ level: 'debug' });
    logger.log(event);
    expect(errorSpy).toHaveBeenCalledWith(JSON.stringify(event));
  });

  it('writes debug/info/warn and handles error branches', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'debug' });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(errorSpy).toHaveBeenCalledWith('d');
    expect(errorSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('keeps stdout free at every level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'debug' });
    logger.log(event);
    logger.debug('d');
    logger.info('i');
    logger.child({ worker: 1 }).debug('w');

    expect(logSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
  });

  it('drops messages below the configured level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'warn' });
    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('w');
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(errorSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ a: 1 }).child({ b: 'x' }).info('hello');
    expect(errorSpy).toHaveBeenCalledWith('[a=1 b=x] hello');

    logger.child({ worker: 2 }).warn('slow');
    expect(warnSpy).toHaveBeenCalledWith('[worker=2] slow');
  });
});

describe('SilentLogger', () => {
  it('never touches the console and returns itself as child', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new SilentLogger();

    logger.log();
    logger.info();
    logger.error();

    expect(errorSpy).not.toHaveBeenCalled();
    expect(logger.child()).toBe(logger);
    errorSpy.mockRestore();
  });
});
