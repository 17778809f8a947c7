import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../lib/log.js';

describe('createLogger', () => {
  const original = process.env.LOG_LEVEL;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    if (original === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = original;
    vi.restoreAllMocks();
  });

  it('prefixes output with its scope', () => {
    process.env.LOG_LEVEL = 'info';
    createLogger('research').info('started', 3);
    expect(console.log).toHaveBeenCalledWith('[research]', 'started', 3);
  });

  it('drops messages below the configured level', () => {
    process.env.LOG_LEVEL = 'warn';
    const log = createLogger('api');
    log.info('hidden');
    log.warn('shown');
    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith('[api]', 'shown');
  });

  it('falls back to info for unknown levels', () => {
    process.env.LOG_LEVEL = 'chatty';
    createLogger('x').info('visible');
    expect(console.log).toHaveBeenCalledTimes(1);
  });
});
