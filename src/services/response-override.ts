import { z } from 'zod';
import { fail, ok, type ChatResult, type Result } from '../providers/base.js';
import { ChatModelError, ConfigurationError } from '../providers/errors.js';
import { AssistantMessageSchema } from '../schemas/request.js';
import { validationIssues } from '../schemas/format.js';

export const UNEXPECTED_OVERRIDE =
  'An unexpected fake API response was set. Should be a success or error result';

const OverrideSchema = z.discriminatedUnion('success', [
  z.object({ success: z.literal(true), data: AssistantMessageSchema }),
  z.object({ success: z.literal(false), error: z.instanceof(Error) }),
]);

/**
 * A canned result returned by `ReplicateChatModel.call` in place of a live
 * prediction. Scoped to the call it is passed to.
 */
export class ResponseOverride {
  private constructor(readonly result: ChatResult) {}

  static from(value: unknown): Result<ResponseOverride, ConfigurationError> {
    const parsed = OverrideSchema.safeParse(value);
    if (!parsed.success) {
      return fail(new ConfigurationError(UNEXPECTED_OVERRIDE, validationIssues(parsed.error)));
    }

    const { data } = parsed;
    if (data.success) {
      return ok(new ResponseOverride(ok(data.data)));
    }
    const error = data.error instanceof ChatModelError
      ? data.error
      : new ChatModelError('remote_job', data.error.message, { cause: data.error });
    return ok(new ResponseOverride(fail(error)));
  }
}
