import { fail, ok } from '../providers/base.js';
import { MalformedResponseError, TransportError, isRetryableStatus } from '../providers/errors.js';
import { logger } from '../middleware/logger.js';
import type {
  PredictionRequest,
  PredictionTransport,
  RequestOptions,
  TransportResult,
} from './prediction-transport.js';

export interface HttpTransportOptions {
  endpoint: string;
  apiToken: string;
  fetch?: typeof fetch;
}

const BODY_PREVIEW_LENGTH = 400;

export class HttpPredictionTransport implements PredictionTransport {
  private baseUrl: string;
  private apiToken: string;
  private fetchFn: typeof fetch;

  constructor(options: HttpTransportOptions) {
    this.baseUrl = options.endpoint.endsWith('/') ? options.endpoint : `${options.endpoint}/`;
    this.apiToken = options.apiToken;
    this.fetchFn = options.fetch ?? fetch;
  }

  createPrediction(body: PredictionRequest, options: RequestOptions): Promise<TransportResult> {
    return this.request('POST', 'predictions', options, body);
  }

  getPrediction(id: string, options: RequestOptions): Promise<TransportResult> {
    return this.request('GET', `predictions/${encodeURIComponent(id)}`, options);
  }

  listModelVersions(modelId: string, options: RequestOptions): Promise<TransportResult> {
    const modelPath = modelId.split('/').map(encodeURIComponent).join('/');
    return this.request('GET', `models/${modelPath}/versions`, options);
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    options: RequestOptions,
    body?: unknown
  ): Promise<TransportResult> {
    const url = new URL(path, this.baseUrl);
    const controller = new AbortController();
    let timedOut = false;

    const timer = options.timeout > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, options.timeout)
      : undefined;
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.apiToken}`,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (timedOut) {
        return fail(new TransportError(`Request timed out after ${options.timeout}ms`, {
          retryable: true,
          cause: error,
        }));
      }
      if (options.signal?.aborted) {
        return fail(new TransportError('Request aborted', { retryable: false, cause: error }));
      }
      const reason = error instanceof Error ? error.message : String(error);
      return fail(new TransportError(`Network error: ${reason}`, { retryable: true, cause: error }));
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }

    logger.debug({ method, url: url.pathname, status: response.status }, 'Replicate response');

    if (!response.ok) {
      return fail(new TransportError(
        `Replicate request failed with status ${response.status}: ${text.slice(0, BODY_PREVIEW_LENGTH) || '(empty body)'}`,
        { status: response.status, retryable: isRetryableStatus(response.status) }
      ));
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return ok(parsed);
    } catch {
      return fail(new MalformedResponseError(
        `Replicate returned a non-JSON response: ${text.slice(0, BODY_PREVIEW_LENGTH) || '(empty body)'}`
      ));
    }
  }
}
