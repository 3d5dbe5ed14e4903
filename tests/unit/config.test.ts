import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
  it('reads the Replicate settings from the environment', () => {
    const result = loadConfig({
      PORT: '8080',
      REPLICATE_API_TOKEN: 'test-token',
      REPLICATE_MODEL: 'meta/llama-2-13b-chat',
      REPLICATE_VERSION: 'aabbccdd',
      REPLICATE_TEMPERATURE: '0.75',
      REPLICATE_TOP_K: '40',
      REPLICATE_RECEIVE_TIMEOUT_MS: '10000',
      REPLICATE_POLL_DEADLINE_MS: '120000',
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.port).toBe(8080);
    expect(result.data.host).toBe('0.0.0.0');
    expect(result.data.apiToken).toBe('test-token');
    expect(result.data.replicate).toMatchObject({
      model: 'meta/llama-2-13b-chat',
      version: 'aabbccdd',
      temperature: 0.75,
      topP: 0.9,
      topK: 40,
      receiveTimeout: 10000,
      polling: { initialDelay: 250, maxDelay: 5000, factor: 2, deadline: 120000 },
    });
  });

  it('requires a model version', () => {
    const result = loadConfig({ REPLICATE_API_TOKEN: 'test-token' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues).toEqual(["version: can't be blank"]);
  });

  it('rejects a non-numeric port', () => {
    const result = loadConfig({ PORT: 'eighty', REPLICATE_VERSION: 'aabbccdd' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues).toHaveLength(1);
    expect(result.error.issues[0]?.startsWith('PORT: ')).toBe(true);
  });

  it('treats empty numeric variables as unset', () => {
    const result = loadConfig({
      PORT: '',
      REPLICATE_VERSION: 'aabbccdd',
      REPLICATE_TEMPERATURE: '',
      REPLICATE_POLL_INITIAL_DELAY_MS: '',
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.port).toBe(3000);
    expect(result.data.replicate.temperature).toBe(1);
    expect(result.data.replicate.polling.initialDelay).toBe(250);
  });
});
