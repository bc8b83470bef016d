import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  isRetryableError,
  LogbridgeError,
  SinkStoppedError,
  TranslationError,
  wrapError,
} from './index.js';

describe('errors', () => {
  it('should tag translation failures with their reason', () => {
    const malformed = TranslationError.malformed('payload is empty', { messageId: 'm-1' });
    const dropped = TranslationError.dropped('entry dropped by relabel rules');

    expect(malformed.reason).toBe('malformed');
    expect(malformed.code).toBe('E2001');
    expect(malformed.context).toMatchObject({ category: 'TRANSLATION', messageId: 'm-1' });
    expect(dropped.reason).toBe('dropped');
    expect(dropped.code).toBe('E2002');
  });

  it('should mark a stopped sink as retryable', () => {
    expect(isRetryableError(new SinkStoppedError())).toBe(true);
    expect(isRetryableError(new ConfigurationError('bad config'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });

  it('should serialize to JSON', () => {
    const json = new ConfigurationError('bad config').toJSON();

    expect(json).toMatchObject({
      name: 'ConfigurationError',
      code: 'E6001',
      message: 'bad config',
      context: { category: 'CONFIGURATION', severity: 'CRITICAL', retryable: false },
    });
  });

  describe('wrapError()', () => {
    it('should return logbridge errors unchanged', () => {
      const error = new SinkStoppedError();
      expect(wrapError(error)).toBe(error);
    });

    it('should wrap plain errors and values', () => {
      const wrapped = wrapError(new TypeError('boom'));

      expect(wrapped).toBeInstanceOf(LogbridgeError);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.context.originalError).toBe('TypeError');
      expect(wrapError('text').message).toBe('text');
    });
  });
});
