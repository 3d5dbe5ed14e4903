import { fail, ok, type Result } from '../providers/base.js';
import { MalformedResponseError, PollingHaltedError } from '../providers/errors.js';
import { PredictionSchema, type SucceededPrediction } from '../schemas/request.js';
import { formatValidationError } from '../schemas/format.js';
import type { PollingOptions } from '../schemas/config.js';
import { logger } from '../middleware/logger.js';
import { trackPoll } from '../middleware/metrics.js';
import { nextDelay, sleep } from './backoff.js';
import { toRemoteJobError } from './normalizer.js';
import type { PredictionTransport, TransportResult } from './prediction-transport.js';

export type PollState = 'pending' | 'in_flight' | 'succeeded' | 'failed' | 'canceled';

export interface WaitOptions {
  /** Per status-fetch timeout in ms. */
  timeout: number;
  polling: PollingOptions;
  signal?: AbortSignal;
}

function halted(id: string, reason: 'deadline' | 'aborted', deadline: number) {
  const message = reason === 'deadline'
    ? `Prediction ${id} did not finish within ${deadline}ms`
    : `Polling for prediction ${id} was aborted`;
  return fail(new PollingHaltedError(message, reason));
}

/**
 * Signal for one status fetch: aborts when the caller aborts or when what is
 * left of the polling deadline runs out.
 */
function deadlineSignal(remaining: number, signal?: AbortSignal) {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, Math.max(remaining, 0));
  const onAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    expired: () => expired,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Polls a prediction until it reaches a terminal status.
 *
 * Non-terminal statuses are re-polled with exponential backoff until
 * `polling.deadline` ms have passed since the first fetch; the deadline also
 * cuts short a status fetch still in progress. Transport failures
 * and unrecognised payloads end the loop immediately; nothing is retried.
 */
export async function waitForPrediction(
  transport: PredictionTransport,
  id: string,
  options: WaitOptions
): Promise<Result<SucceededPrediction>> {
  const { polling, signal } = options;
  const startedAt = Date.now();
  let delay = polling.initialDelay;
  let state: PollState = 'pending';

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      return halted(id, 'aborted', polling.deadline);
    }

    const budget = deadlineSignal(polling.deadline - (Date.now() - startedAt), signal);
    let response: TransportResult;
    try {
      response = await transport.getPrediction(id, { timeout: options.timeout, signal: budget.signal });
    } finally {
      budget.dispose();
    }

    if (!response.success) {
      if (budget.expired()) {
        logger.warn({ predictionId: id, attempt, deadline: polling.deadline }, 'Prediction polling deadline exceeded');
        return halted(id, 'deadline', polling.deadline);
      }
      if (signal?.aborted) {
        return halted(id, 'aborted', polling.deadline);
      }
      logger.warn({ predictionId: id, attempt, error: response.error.message }, 'Prediction status fetch failed');
      return response;
    }

    const parsed = PredictionSchema.safeParse(response.data);
    if (!parsed.success) {
      trackPoll('malformed');
      return fail(new MalformedResponseError(
        `Unexpected prediction status response: ${formatValidationError(parsed.error)}`
      ));
    }

    const prediction = parsed.data;
    const from = state;
    trackPoll(prediction.status);

    switch (prediction.status) {
      case 'succeeded':
        state = prediction.status;
        logger.debug({ predictionId: id, attempt, from, to: state }, 'Prediction succeeded');
        return ok(prediction);
      case 'failed':
      case 'canceled':
        state = prediction.status;
        logger.info({ predictionId: id, attempt, from, to: state }, 'Prediction ended without output');
        return fail(toRemoteJobError(prediction));
      case 'starting':
      case 'processing':
        state = 'in_flight';
        if (from === 'pending') {
          logger.debug({ predictionId: id, status: prediction.status }, 'Prediction in flight');
        }
        break;
    }

    const remaining = polling.deadline - (Date.now() - startedAt);
    if (remaining <= 0) {
      logger.warn({ predictionId: id, attempt, deadline: polling.deadline }, 'Prediction polling deadline exceeded');
      return halted(id, 'deadline', polling.deadline);
    }

    const completed = await sleep(Math.min(delay, remaining), signal);
    if (!completed) {
      return halted(id, 'aborted', polling.deadline);
    }
    delay = nextDelay(delay, polling);
  }
}
