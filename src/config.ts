import { z } from 'zod';
import { fail, ok, type Result } from './providers/base.js';
import { ConfigurationError } from './providers/errors.js';
import { createReplicateConfig, type ReplicateConfig } from './schemas/config.js';
import { formatValidationError, validationIssues } from './schemas/format.js';

export interface AppConfig {
  port: number;
  host: string;
  apiToken: string;
  replicate: ReplicateConfig;
}

// An exported-but-empty variable counts as unset.
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const optionalNumber = z.preprocess(blankAsUnset, z.coerce.number().optional());

const EnvSchema = z.object({
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).max(65535).default(3000)),
  HOST: z.string().min(1).default('0.0.0.0'),
  REPLICATE_API_TOKEN: z.string().default(''),
  REPLICATE_ENDPOINT: z.string().optional(),
  REPLICATE_MODEL: z.string().optional(),
  REPLICATE_VERSION: z.string().optional(),
  REPLICATE_TEMPERATURE: optionalNumber,
  REPLICATE_TOP_P: optionalNumber,
  REPLICATE_TOP_K: optionalNumber,
  REPLICATE_RECEIVE_TIMEOUT_MS: optionalNumber,
  REPLICATE_POLL_INITIAL_DELAY_MS: optionalNumber,
  REPLICATE_POLL_MAX_DELAY_MS: optionalNumber,
  REPLICATE_POLL_DEADLINE_MS: optionalNumber,
});

/**
 * Reads the service configuration from environment variables. Unset
 * Replicate variables fall back to the model defaults.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Result<AppConfig, ConfigurationError> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    return fail(new ConfigurationError(
      `Invalid environment: ${formatValidationError(parsed.error)}`,
      validationIssues(parsed.error)
    ));
  }

  const vars = parsed.data;
  const replicate = createReplicateConfig({
    endpoint: vars.REPLICATE_ENDPOINT,
    model: vars.REPLICATE_MODEL,
    version: vars.REPLICATE_VERSION,
    temperature: vars.REPLICATE_TEMPERATURE,
    topP: vars.REPLICATE_TOP_P,
    topK: vars.REPLICATE_TOP_K,
    receiveTimeout: vars.REPLICATE_RECEIVE_TIMEOUT_MS,
    polling: {
      initialDelay: vars.REPLICATE_POLL_INITIAL_DELAY_MS,
      maxDelay: vars.REPLICATE_POLL_MAX_DELAY_MS,
      deadline: vars.REPLICATE_POLL_DEADLINE_MS,
    },
  });
  if (!replicate.success) {
    return replicate;
  }

  return ok({
    port: vars.PORT,
    host: vars.HOST,
    apiToken: vars.REPLICATE_API_TOKEN,
    replicate: replicate.data,
  });
}
