import { describe, expect, it } from 'vitest';

import { gateLogger } from '../src/core/log.js';
import { createLogger } from './helpers.js';

describe('gateLogger()', () => {
  it('passes everything through when debug is on', () => {
    const logger = createLogger();

    expect(gateLogger(logger, true)).toBe(logger);
  });

  it('drops debug lines but keeps warnings and errors when debug is off', () => {
    const logger = createLogger();
    const gated = gateLogger(logger, false);
    const cause = new Error('boom');

    gated.debug('hidden');
    gated.warn('careful');
    gated.error('failed', cause);

    expect(logger.debug).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith('careful');
    expect(logger.error).toHaveBeenCalledWith('failed', cause);
  });
});
