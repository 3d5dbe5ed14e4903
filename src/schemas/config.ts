import { z } from 'zod';
import { ConfigurationError } from '../providers/errors.js';
import { fail, ok, type Result } from '../providers/base.js';
import { formatValidationError, validationIssues } from './format.js';

export const DEFAULT_ENDPOINT = 'https://api.replicate.com/v1/';
export const DEFAULT_MODEL = 'meta/llama-2-7b-chat';
export const STREAMING_UNSUPPORTED = 'streaming is currently unsupported for Replicate';

const BLANK = "can't be blank";

export const PollingSchema = z
  .object({
    initialDelay: z.number().int().min(0).default(250),
    maxDelay: z.number().int().min(0).default(5000),
    factor: z.number().min(1).default(2),
    deadline: z.number().int().positive().default(600_000),
  })
  .refine(polling => polling.maxDelay >= polling.initialDelay, {
    message: 'maxDelay must be greater than or equal to initialDelay',
    path: ['maxDelay'],
  });

export type PollingOptions = z.infer<typeof PollingSchema>;

export const ReplicateConfigSchema = z.object({
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  model: z.string({ invalid_type_error: BLANK }).min(1, BLANK).default(DEFAULT_MODEL),
  // Replicate runs a specific version of a model, not just the model name.
  version: z.string({ required_error: BLANK, invalid_type_error: BLANK }).min(1, BLANK),
  temperature: z.number().min(0).max(2).default(1.0),
  topP: z.number().min(0).max(1).default(0.9),
  topK: z.number().int().min(1).max(1000).default(50),
  receiveTimeout: z.number().int().min(0).default(30_000),
  stream: z
    .literal(false, { errorMap: () => ({ message: STREAMING_UNSUPPORTED }) })
    .default(false),
  polling: PollingSchema.default({}),
});

export type ReplicateConfig = Readonly<z.infer<typeof ReplicateConfigSchema>>;
export type ReplicateConfigInput = z.input<typeof ReplicateConfigSchema>;

export function createReplicateConfig(attrs: unknown): Result<ReplicateConfig, ConfigurationError> {
  const parsed = ReplicateConfigSchema.safeParse(attrs);
  if (!parsed.success) {
    return fail(
      new ConfigurationError(
        `Invalid Replicate configuration: ${formatValidationError(parsed.error)}`,
        validationIssues(parsed.error)
      )
    );
  }
  return ok(Object.freeze({ ...parsed.data, polling: Object.freeze({ ...parsed.data.polling }) }));
}

export function createReplicateConfigOrThrow(attrs: unknown): ReplicateConfig {
  const result = createReplicateConfig(attrs);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
