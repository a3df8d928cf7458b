import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LogLevel } from './interfaces/logger.interface';
import { Logger } from './logger';

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should format lines with timestamp, level and context', () => {
    const logger = Logger.create({ context: 'Default' });
    const at = new Date('2026-01-02T03:04:05.000Z');

    expect(logger.formatMessage('INFO', 'hello', 'ReviewService', at)).toBe(
      '2026-01-02T03:04:05.000Z [INFO][ReviewService] hello',
    );
    expect(logger.formatMessage('WARN', 'hello', undefined, at)).toBe(
      '2026-01-02T03:04:05.000Z [WARN][Default] hello',
    );
  });

  it('should route levels to the matching console method', () => {
    const logger = Logger.create({ level: LogLevel.DEBUG });

    logger.error('e');
    logger.warn('w');
    logger.info('i');
    logger.debug('d');
    logger.verbose('v');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledTimes(2);
  });

  it('should drop messages below the configured level', () => {
    const logger = Logger.create({ level: LogLevel.WARN });

    logger.info('quiet');
    logger.debug('quieter');

    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should emit structured records at any configured level', () => {
    const logger = Logger.create({ level: LogLevel.ERROR });

    logger.structured('review.invocation', { outcome: 'failed' }, 'ReviewService');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][0]).toContain('[INFO][ReviewService] review.invocation {');
  });

  it('should emit structured records as one JSON line', () => {
    const logger = Logger.create({ level: LogLevel.INFO });

    logger.structured('review.invocation', { outcome: 'failed', attempts: 3 }, 'ReviewService');

    const line: string = logSpy.mock.calls[0][0];
    const match = line.match(/\[INFO\]\[ReviewService\] review\.invocation (\{.*\})$/);
    expect(match).not.toBeNull();
    expect(JSON.parse(match?.[1] ?? '{}')).toMatchObject({ outcome: 'failed', attempts: 3 });
  });

  it('should append to the log file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'logger-'));
    const filePath = path.join(dir, 'review.log');
    const logger = Logger.create({ level: LogLevel.INFO, filePath });

    logger.warn('first', 'Test', { attempt: 1 });
    logger.info('second', 'Test');

    const lines = fs.readFileSync(filePath, 'utf8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/\[WARN\]\[Test\] first \{"attempt":1\}$/);
    expect(lines[1]).toMatch(/\[INFO\]\[Test\] second$/);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should count lines a broken sink could not take', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'logger-'));
    const logger = Logger.create({ level: LogLevel.INFO, filePath: dir });

    expect(() => logger.info('lost')).not.toThrow();
    expect(logger.getDroppedLines()).toBe(1);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
