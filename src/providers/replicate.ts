import { fail, type ChatCallOptions, type ChatModel, type ChatResult, type FunctionDescriptor, type Message, type Result } from './base.js';
import { ConfigurationError, RemoteJobError, UnsupportedFeatureError } from './errors.js';
import { renderPrompt, toMessages } from './prompt.js';
import { createReplicateConfig, type ReplicateConfig } from '../schemas/config.js';
import { logger } from '../middleware/logger.js';
import { trackPrediction } from '../middleware/metrics.js';
import { dispatchResult } from '../services/dispatch.js';
import { HttpPredictionTransport } from '../services/http-transport.js';
import { normalizePrediction } from '../services/normalizer.js';
import { waitForPrediction } from '../services/poller.js';
import { buildPredictionRequest, fetchLatestVersion, submitPrediction } from '../services/predictions.js';
import type { PredictionRequest, PredictionTransport } from '../services/prediction-transport.js';

export const FUNCTIONS_UNSUPPORTED =
  'Function calls are not currently supported for Replicate-hosted models';

export interface ReplicateChatModelDeps {
  transport?: PredictionTransport;
  apiToken?: string;
  fetch?: typeof fetch;
}

/**
 * Chat model backed by Replicate's asynchronous predictions API.
 *
 * A call renders the conversation into a single Llama 2 style prompt, creates a
 * prediction, polls it until it finishes and returns the joined output as an
 * assistant message. Streaming and function calls are not supported.
 */
export class ReplicateChatModel implements ChatModel {
  name = 'replicate';
  readonly config: ReplicateConfig;
  private transport: PredictionTransport;

  constructor(config: ReplicateConfig, deps: ReplicateChatModelDeps = {}) {
    this.config = config;
    this.transport = deps.transport ?? new HttpPredictionTransport({
      endpoint: config.endpoint,
      apiToken: deps.apiToken ?? '',
      fetch: deps.fetch,
    });
  }

  static create(
    attrs: unknown,
    deps?: ReplicateChatModelDeps
  ): Result<ReplicateChatModel, ConfigurationError> {
    const config = createReplicateConfig(attrs);
    if (!config.success) {
      return config;
    }
    return { success: true, data: new ReplicateChatModel(config.data, deps) };
  }

  /**
   * Request body for creating a prediction from these messages.
   */
  forApi(messages: Message[], _functions: FunctionDescriptor[] = []): PredictionRequest {
    return buildPredictionRequest(this.config, renderPrompt(messages));
  }

  async call(input: string | Message[], options: ChatCallOptions = {}): Promise<ChatResult> {
    if (options.functions && options.functions.length > 0) {
      return fail(new UnsupportedFeatureError(FUNCTIONS_UNSUPPORTED));
    }

    if (options.override) {
      logger.warn({ model: this.config.model }, 'Found override API response. Will not make live API call.');
      dispatchResult(options.override.result, options.onResult);
      return options.override.result;
    }

    const startedAt = Date.now();
    const rendered = renderPrompt(toMessages(input));

    const submitted = await submitPrediction(this.transport, this.config, rendered, options.signal);
    if (!submitted.success) {
      this.track(submitted.error.kind, startedAt);
      return submitted;
    }

    const finished = await waitForPrediction(this.transport, submitted.data, {
      timeout: this.config.receiveTimeout,
      polling: this.config.polling,
      signal: options.signal,
    });

    if (!finished.success) {
      const error = finished.error;
      this.track(error instanceof RemoteJobError ? error.status : error.kind, startedAt);
      // Failed and canceled predictions are outcomes too; observers hear about them.
      if (error instanceof RemoteJobError) {
        dispatchResult(finished, options.onResult);
      }
      return finished;
    }

    const result = normalizePrediction(finished.data);
    this.track(result.success ? 'succeeded' : result.error.kind, startedAt);
    dispatchResult(result, options.onResult);
    return result;
  }

  /**
   * Id of the most recently published version of `modelId` ("owner/name").
   */
  latestVersion(modelId: string = this.config.model): Promise<Result<string>> {
    return fetchLatestVersion(this.transport, modelId, this.config.receiveTimeout);
  }

  private track(outcome: string, startedAt: number): void {
    trackPrediction(this.config.model, outcome, (Date.now() - startedAt) / 1000);
  }
}
