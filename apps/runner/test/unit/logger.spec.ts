import { describe, expect, it } from 'vitest';
import { createLogger } from '../../src/logger';

describe('createLogger', () => {
  it('uses the configured level', () => {
    const logger = createLogger({ logLevel: 'warn', isProduction: true });

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
  });
});
