import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, isLogLevel } from '../../../src/shared/Logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write one JSON line per entry to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    new Logger('PathResolver').info('Template registered', { name: 'shot' });

    expect(write).toHaveBeenCalledTimes(1);
    const line = String(write.mock.calls[0][0]);
    expect(line.endsWith('\n')).toBe(true);
    const entry: unknown = JSON.parse(line);
    expect(entry).toMatchObject({
      level: 'info',
      context: 'PathResolver',
      message: 'Template registered',
      name: 'shot',
    });
  });

  it('should drop entries below the minimum level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = new Logger('test', 'warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown');
    expect(write).toHaveBeenCalledTimes(2);
  });

  it('should keep the level in child loggers', () => {
    const child = new Logger('parent', 'error').child('child');
    expect(child.level).toBe('error');
  });

  it('should recognise level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
