import type { ChatResult, ResultObserver } from '../providers/base.js';
import { logger } from '../middleware/logger.js';

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

function reportObserverFailure(error: unknown): void {
  logger.warn(
    { error: error instanceof Error ? error.message : String(error) },
    'Result observer failed'
  );
}

/**
 * Hands the result to the observer, if any. The observer cannot affect the
 * call: its return value is dropped and its failures are only logged.
 */
export function dispatchResult(result: ChatResult, observer?: ResultObserver): void {
  if (!observer) return;

  try {
    const returned = observer(result);
    if (isPromiseLike(returned)) {
      void Promise.resolve(returned).catch(reportObserverFailure);
    }
  } catch (error) {
    reportObserverFailure(error);
  }
}
