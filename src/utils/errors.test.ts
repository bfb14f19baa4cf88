import { describe, it, expect } from 'vitest';
import { ConfigError, PublishError, errorMessage } from './errors.js';

describe('errorMessage', () => {
  it('appends a JSON payload', () => {
    const err = new PublishError('HTTP 400', 'instagram', 'reel', { error: { code: 100 } });
    expect(errorMessage(err)).toBe('HTTP 400: {"error":{"code":100}}');
  });

  it('appends a text payload as is', () => {
    expect(errorMessage(new PublishError('HTTP 502', 'facebook', 'feed', 'Bad Gateway'))).toBe('HTTP 502: Bad Gateway');
  });

  it('falls back to the message or the value', () => {
    expect(errorMessage(new ConfigError(['IG_ACCOUNT_ID is missing']))).toBe('Invalid configuration: IG_ACCOUNT_ID is missing');
    expect(errorMessage('plain')).toBe('plain');
  });
});
