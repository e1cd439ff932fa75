import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger } from './ConsoleLogger.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write one JSON line with bindings and context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new ConsoleLogger('debug').child({ component: 'extraction' }).info('Extraction finished', { records: 2 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
      level: 'INFO',
      message: 'Extraction finished',
      component: 'extraction',
      records: 2,
    });
  });

  it('should drop messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = new ConsoleLogger('warn');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should serialize errors on stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new ConsoleLogger().error('Statement ingestion failed', new Error('disk full'));

    expect(JSON.parse(String(error.mock.calls[0][0]))).toMatchObject({
      level: 'ERROR',
      error: { name: 'Error', message: 'disk full' },
    });
  });
});
