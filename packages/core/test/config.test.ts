import { describe, expect, it } from 'vitest';
import { cfg, configSchema } from '../src/utils/config.js';

describe('Configuration System', () => {
  it('should load config with default values', () => {
    expect(cfg.NODE_ENV).toBe('test'); // vitest sets NODE_ENV
    expect(cfg.CIPHER_BLOCK_SIZE).toBe(16);
    expect(cfg.CIPHER_CONVENTION).toBe('id-to-bfs');
  });

  it('should coerce numeric values from strings', () => {
    expect(configSchema.parse({ CIPHER_BLOCK_SIZE: '8' }).CIPHER_BLOCK_SIZE).toBe(8);
  });

  it('should validate constraints', () => {
    expect(() => configSchema.parse({ CIPHER_BLOCK_SIZE: '0' })).toThrow();
    expect(() => configSchema.parse({ CIPHER_CONVENTION: 'sideways' })).toThrow();
    expect(() => configSchema.parse({ LOG_LEVEL: 'loud' })).toThrow();
  });
});
