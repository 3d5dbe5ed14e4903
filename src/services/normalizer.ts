import { fail, ok, type ChatResult } from '../providers/base.js';
import { MalformedResponseError, RemoteJobError } from '../providers/errors.js';
import { AssistantMessageSchema, type TerminalPrediction } from '../schemas/request.js';
import { formatValidationError } from '../schemas/format.js';

export const PREDICTION_CANCELED = 'Prediction canceled';
export const PREDICTION_FAILED = 'Prediction failed';

export function toRemoteJobError(
  prediction: Extract<TerminalPrediction, { status: 'failed' | 'canceled' }>
): RemoteJobError {
  if (prediction.status === 'canceled') {
    return new RemoteJobError(PREDICTION_CANCELED, 'canceled');
  }

  const reason = prediction.error;
  if (typeof reason === 'string' && reason.length > 0) {
    return new RemoteJobError(reason, 'failed');
  }
  if (reason === undefined || reason === null) {
    return new RemoteJobError(PREDICTION_FAILED, 'failed');
  }
  return new RemoteJobError(JSON.stringify(reason), 'failed');
}

/**
 * Turns a terminal prediction into the chat result. The model streams its
 * answer as fragments in `output`; they are joined without a separator.
 */
export function normalizePrediction(prediction: TerminalPrediction): ChatResult {
  if (prediction.status !== 'succeeded') {
    return fail(toRemoteJobError(prediction));
  }

  const message = AssistantMessageSchema.safeParse({
    role: 'assistant',
    status: 'complete',
    content: prediction.output.join(''),
  });

  if (!message.success) {
    return fail(new MalformedResponseError(formatValidationError(message.error)));
  }
  return ok(message.data);
}
