/**
 * @fileoverview Tests for sensitive-field redaction
 */

import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '../src/createLogger.js';
import { isSensitiveFieldName, redactSensitiveFields, REDACTED } from '../src/formats.js';
import { captureStream } from './helpers/capture.js';

describe('isSensitiveFieldName', () => {
  it('should match common credential names in any case', () => {
    for (const key of ['password', 'PASSWORD', 'passwd', 'pwd', 'apiKey', 'api_key', 'Authorization', 'token']) {
      expect(isSensitiveFieldName(key)).toBe(true);
    }
  });

  it('should leave ordinary names alone', () => {
    for (const key of ['username', 'command', 'result', 'author']) {
      expect(isSensitiveFieldName(key)).toBe(false);
    }
  });
});

describe('redactSensitiveFields', () => {
  it('should redact nested fields and return a copy', () => {
    const input = { user: { name: 'alice', password: 'test-secret' }, list: [{ token: 'test-token' }] };

    expect(redactSensitiveFields(input)).toEqual({
      user: { name: 'alice', password: REDACTED },
      list: [{ token: REDACTED }],
    });
    expect(input.user.password).toBe('test-secret');
  });

  it('should return primitives unchanged', () => {
    expect(redactSensitiveFields('plain')).toBe('plain');
    expect(redactSensitiveFields(42)).toBe(42);
  });
});

describe('PII redaction in log output', () => {
  it('should redact sensitive metadata but keep the message', async () => {
    const { stream, records } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    logger.info('Bot login', { user: 'tapline', token: 'test-token', discord: { secret: 'test-secret' } });

    await vi.waitFor(() => expect(records()).toHaveLength(1));
    expect(records()[0]).toMatchObject({
      message: 'Bot login',
      user: 'tapline',
      token: REDACTED,
      discord: { secret: REDACTED },
    });
  });
});
