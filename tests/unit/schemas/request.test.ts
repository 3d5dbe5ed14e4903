import { describe, it, expect } from 'vitest';
import {
  ChatCompletionRequestSchema,
  MessageSchema,
  PredictionSchema,
} from '../../../src/schemas/request.js';
import { formatValidationError } from '../../../src/schemas/format.js';

describe('Request Schemas', () => {
  describe('MessageSchema', () => {
    it('validates valid messages', () => {
      const result = MessageSchema.safeParse({
        role: 'user',
        content: 'hello',
      });
      expect(result.success).toBe(true);
    });

    it('rejects invalid roles', () => {
      const result = MessageSchema.safeParse({
        role: 'function',
        content: 'hello',
      });
      expect(result.success).toBe(false);
    });
  });

  describe('ChatCompletionRequestSchema', () => {
    it('validates valid requests', () => {
      const result = ChatCompletionRequestSchema.safeParse({
        messages: [{ role: 'user', content: 'hello' }],
      });
      expect(result.success).toBe(true);
    });

    it('requires at least one message', () => {
      const result = ChatCompletionRequestSchema.safeParse({ messages: [] });
      expect(result.success).toBe(false);
    });

    it('accepts function descriptors', () => {
      const result = ChatCompletionRequestSchema.safeParse({
        messages: [{ role: 'user', content: 'hello' }],
        functions: [{ name: 'hello_world', description: 'Give a hello world greeting.' }],
      });
      expect(result.success).toBe(true);
    });
  });

  describe('PredictionSchema', () => {
    it('accepts every known status', () => {
      for (const payload of [
        { status: 'starting' },
        { status: 'processing' },
        { status: 'succeeded', output: ['a'] },
        { status: 'failed', error: 'boom' },
        { status: 'canceled' },
      ]) {
        expect(PredictionSchema.safeParse(payload).success).toBe(true);
      }
    });

    it('rejects a succeeded payload without output', () => {
      const result = PredictionSchema.safeParse({ status: 'succeeded' });
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(formatValidationError(result.error)).toBe('output: Required');
    });

    it('rejects an unknown status', () => {
      expect(PredictionSchema.safeParse({ status: 'queued' }).success).toBe(false);
    });
  });
});
