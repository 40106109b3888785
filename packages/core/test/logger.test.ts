import { describe, expect, it, vi } from 'vitest';
import { KeyMismatchError } from '../src/errors/index.js';
import { cfg } from '../src/utils/config.js';
import { createLoggerFactory, createModuleLogger, logError } from '../src/utils/logger.js';

describe('logger', () => {
  it('only reports warnings in tests', () => {
    const factory = createLoggerFactory({ ...cfg, NODE_ENV: 'test', LOG_LEVEL: 'debug' });

    expect(factory.getLogger().level).toBe('warn');
  });

  it('follows LOG_LEVEL in production', () => {
    const factory = createLoggerFactory({ ...cfg, NODE_ENV: 'production', LOG_LEVEL: 'error' });

    expect(factory.getLogger().level).toBe('error');
  });

  it('tags module loggers', () => {
    expect(createModuleLogger('CipherEngine').bindings()).toMatchObject({ module: 'CipherEngine' });
  });

  it('logs cipher errors as warnings and anything else as errors', () => {
    const moduleLogger = createModuleLogger('test');
    const warn = vi.spyOn(moduleLogger, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(moduleLogger, 'error').mockImplementation(() => undefined);

    logError(moduleLogger, new KeyMismatchError(1, 'encrypt'), { operation: 'encrypt' });
    logError(moduleLogger, new Error('unexpected'));

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[1]).toBe('Key 1 does not match the tree root');
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[1]).toBe('unexpected');
  });
});
