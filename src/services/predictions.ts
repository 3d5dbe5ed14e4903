import { fail, ok, type Result } from '../providers/base.js';
import { ConfigurationError, MalformedResponseError } from '../providers/errors.js';
import type { RenderedPrompt } from '../providers/prompt.js';
import type { ReplicateConfig } from '../schemas/config.js';
import { CreatedPredictionSchema, ModelVersionListSchema } from '../schemas/request.js';
import { formatValidationError } from '../schemas/format.js';
import { logger } from '../middleware/logger.js';
import type { PredictionRequest, PredictionTransport } from './prediction-transport.js';

export function buildPredictionRequest(config: ReplicateConfig, rendered: RenderedPrompt): PredictionRequest {
  return {
    version: config.version,
    input: {
      temperature: config.temperature,
      top_p: config.topP,
      top_k: config.topK,
      system_prompt: rendered.systemPrompt,
      prompt: rendered.prompt,
    },
  };
}

/**
 * Creates the prediction and returns its id. Replicate starts working on it
 * right away, whether or not anyone waits for the outcome.
 */
export async function submitPrediction(
  transport: PredictionTransport,
  config: ReplicateConfig,
  rendered: RenderedPrompt,
  signal?: AbortSignal
): Promise<Result<string>> {
  const response = await transport.createPrediction(buildPredictionRequest(config, rendered), {
    timeout: config.receiveTimeout,
    signal,
  });
  if (!response.success) {
    logger.warn({ model: config.model, error: response.error.message }, 'Prediction submission failed');
    return response;
  }

  const created = CreatedPredictionSchema.safeParse(response.data);
  if (!created.success) {
    return fail(new MalformedResponseError(
      `Prediction was created without an id: ${formatValidationError(created.error)}`
    ));
  }

  logger.info({ model: config.model, predictionId: created.data.id }, 'Prediction created');
  return ok(created.data.id);
}

export async function fetchLatestVersion(
  transport: PredictionTransport,
  modelId: string,
  timeout: number
): Promise<Result<string>> {
  if (!/^[^/\s]+\/[^/\s]+$/.test(modelId)) {
    return fail(new ConfigurationError(`Model id must look like "owner/name", got "${modelId}"`));
  }

  const response = await transport.listModelVersions(modelId, { timeout });
  if (!response.success) {
    return response;
  }

  const versions = ModelVersionListSchema.safeParse(response.data);
  if (!versions.success) {
    return fail(new MalformedResponseError(
      `Unexpected model versions response: ${formatValidationError(versions.error)}`
    ));
  }

  const latest = versions.data.results[0];
  if (!latest) {
    return fail(new MalformedResponseError(`No versions published for ${modelId}`));
  }
  return ok(latest.id);
}
