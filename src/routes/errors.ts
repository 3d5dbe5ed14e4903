import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ChatModelError, ChatModelErrorKind } from '../providers/errors.js';
import { logger } from '../middleware/logger.js';

const STATUS_BY_KIND: Record<ChatModelErrorKind, number> = {
  configuration: 500,
  unsupported_feature: 400,
  transport: 502,
  remote_job: 422,
  malformed_response: 502,
  polling_halted: 504,
};

export function statusForError(error: ChatModelError): number {
  return STATUS_BY_KIND[error.kind];
}

export function sendChatModelError(request: FastifyRequest, reply: FastifyReply, error: ChatModelError) {
  const statusCode = statusForError(error);
  logger.warn({ requestId: request.id, kind: error.kind, error: error.message }, 'Chat model error');

  return reply.code(statusCode).send({
    error: error.kind,
    message: error.message,
    requestId: request.id,
  });
}
