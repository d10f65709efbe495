import { describe, it, expect } from 'vitest';
import { createModuleLogger, logger } from '../../src/lib/logger.js';

describe('Logger', () => {
  it('should be silenced under test', () => {
    expect(logger.level).toBe('silent');
  });

  it('should create child loggers for modules', () => {
    const child = createModuleLogger('image-hash');

    expect(child.bindings()).toMatchObject({ module: 'image-hash' });
    expect(child.warn).toBeInstanceOf(Function);
    expect(child.debug).toBeInstanceOf(Function);
  });

  it('should tag entries with the library name', () => {
    expect(logger.bindings()).toMatchObject({ app: 'image-fingerprint', env: 'test' });
  });
});
