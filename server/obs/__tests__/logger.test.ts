import { describe, expect, it, vi } from 'vitest';
import { createLogger } from '../logger';

describe('createLogger', () => {
  it('drops messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ observability: { logLevel: 'warn' } });

    logger.debug('hidden');
    logger.info('hidden');

    expect(log).not.toHaveBeenCalled();
  });

  it('writes one JSON line with the metadata', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger({ observability: { logLevel: 'info' } });

    logger.warn('Fetch failed', { url: 'https://site.test/', kind: 'timeout' });

    expect(warn).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(warn.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'warn', message: 'Fetch failed', url: 'https://site.test/', kind: 'timeout' });
    expect(typeof entry.ts).toBe('string');
  });

  it('serializes errors by name and message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger({ observability: { logLevel: 'error' } });

    logger.error('Unexpected error while unfurling', { error: new TypeError('bad input') });

    const entry = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry.error).toEqual({ name: 'TypeError', message: 'bad input' });
  });
});
