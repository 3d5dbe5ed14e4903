import type { Result } from '../providers/base.js';
import type { MalformedResponseError, TransportError } from '../providers/errors.js';

export interface PredictionInput {
  temperature: number;
  top_p: number;
  top_k: number;
  system_prompt: string;
  prompt: string;
}

export interface PredictionRequest {
  version: string;
  input: PredictionInput;
}

export interface RequestOptions {
  /** Per round-trip deadline in ms; 0 disables it. */
  timeout: number;
  /** Implementations settle promptly with a failure once this aborts. */
  signal?: AbortSignal;
}

export type TransportResult = Result<unknown, TransportError | MalformedResponseError>;

/**
 * The three Replicate endpoints the chat model talks to. Implementations
 * return the decoded JSON body; interpreting it is left to the caller.
 */
export interface PredictionTransport {
  createPrediction(body: PredictionRequest, options: RequestOptions): Promise<TransportResult>;
  getPrediction(id: string, options: RequestOptions): Promise<TransportResult>;
  listModelVersions(modelId: string, options: RequestOptions): Promise<TransportResult>;
}
