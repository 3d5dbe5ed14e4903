import type { FastifyInstance } from 'fastify';
import { ChatCompletionRequestSchema, ChatCompletionResponseSchema } from '../schemas/request.js';
import type { ReplicateChatModel } from '../providers/replicate.js';
import { logger } from '../middleware/logger.js';
import { sendChatModelError } from './errors.js';

export async function chatRoutes(fastify: FastifyInstance, model: ReplicateChatModel) {
  fastify.post('/v1/chat/completions', async (request, reply) => {
    const body = ChatCompletionRequestSchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({
        error: 'Validation error',
        details: body.error.errors,
      });
    }

    logger.info({
      requestId: request.id,
      model: model.config.model,
      messageCount: body.data.messages.length,
    }, 'Chat completion request');

    const result = await model.call(body.data.messages, {
      functions: body.data.functions,
    });

    if (!result.success) {
      return sendChatModelError(request, reply, result.error);
    }

    const response = ChatCompletionResponseSchema.parse({ status: 'complete', ...result.data });

    logger.info({
      requestId: request.id,
      length: response.content.length,
    }, 'Chat completion success');

    return reply.code(200).send(response);
  });
}
