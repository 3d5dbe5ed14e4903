import { describe, it, expect } from 'vitest';
import {
  normalizePrediction,
  PREDICTION_CANCELED,
  PREDICTION_FAILED,
} from '../../../src/services/normalizer.js';
import { RemoteJobError } from '../../../src/providers/errors.js';

describe('normalizePrediction', () => {
  it('joins output fragments without a separator', () => {
    const result = normalizePrediction({ status: 'succeeded', output: ['Hello', ' Ben', '!'] });

    expect(result).toEqual({
      success: true,
      data: { role: 'assistant', status: 'complete', content: 'Hello Ben!' },
    });
  });

  it('keeps empty and leading-space fragments', () => {
    const result = normalizePrediction({
      status: 'succeeded',
      output: ['', ' Hello', ' Ben', '!', ' *', 'sm', 'iling', '*'],
    });

    expect(result.success && result.data.content).toBe(' Hello Ben! *smiling*');
  });

  it('returns the provider reason for a failed prediction', () => {
    const result = normalizePrediction({ status: 'failed', error: 'Your input is too long.' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(RemoteJobError);
    expect(result.error.message).toBe('Your input is too long.');
  });

  it('falls back to a generic reason when the failure has none', () => {
    const result = normalizePrediction({ status: 'failed', error: null });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(PREDICTION_FAILED);
  });

  it('serializes a structured failure reason', () => {
    const result = normalizePrediction({ status: 'failed', error: { detail: 'CUDA out of memory' } });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('{"detail":"CUDA out of memory"}');
  });

  it('returns the fixed message for a canceled prediction', () => {
    const result = normalizePrediction({ status: 'canceled' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(PREDICTION_CANCELED);
    expect(result.error).toMatchObject({ kind: 'remote_job', status: 'canceled' });
  });

  it('returns identical results for the same payload', () => {
    const payload = { status: 'succeeded' as const, output: ['a', 'b'] };

    expect(normalizePrediction(payload)).toEqual(normalizePrediction(payload));
  });
});
