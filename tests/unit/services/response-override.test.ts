import { describe, it, expect } from 'vitest';
import { ResponseOverride, UNEXPECTED_OVERRIDE } from '../../../src/services/response-override.js';
import { ConfigurationError, RemoteJobError } from '../../../src/providers/errors.js';

describe('ResponseOverride.from', () => {
  it('accepts a success result', () => {
    const override = ResponseOverride.from({
      success: true,
      data: { role: 'assistant', status: 'complete', content: 'Colorful Threads' },
    });

    expect(override.success).toBe(true);
    if (!override.success) return;
    expect(override.data.result).toEqual({
      success: true,
      data: { role: 'assistant', status: 'complete', content: 'Colorful Threads' },
    });
  });

  it('keeps a chat model error as-is', () => {
    const error = new RemoteJobError('Prediction canceled', 'canceled');

    const override = ResponseOverride.from({ success: false, error });

    expect(override.success).toBe(true);
    if (!override.success) return;
    expect(override.data.result).toEqual({ success: false, error });
  });

  it('wraps a plain error', () => {
    const override = ResponseOverride.from({ success: false, error: new Error('quota exceeded') });

    expect(override.success).toBe(true);
    if (!override.success || override.data.result.success) return;
    expect(override.data.result.error.kind).toBe('remote_job');
    expect(override.data.result.error.message).toBe('quota exceeded');
  });

  it.each([
    ['a bare string', 'Rainbow Sox Co.'],
    ['a user message', { success: true, data: { role: 'user', content: 'hi' } }],
    ['an error without an Error', { success: false, error: 'nope' }],
    ['nothing', undefined],
  ])('rejects %s', (_label, value) => {
    const override = ResponseOverride.from(value);

    expect(override.success).toBe(false);
    if (override.success) return;
    expect(override.error).toBeInstanceOf(ConfigurationError);
    expect(override.error.message).toBe(UNEXPECTED_OVERRIDE);
  });
});
