import type { FastifyInstance } from 'fastify';
import { ModelVersionParamsSchema } from '../schemas/request.js';
import type { ReplicateChatModel } from '../providers/replicate.js';
import { sendChatModelError } from './errors.js';

export async function modelRoutes(fastify: FastifyInstance, model: ReplicateChatModel) {
  fastify.get('/v1/models/:owner/:name/versions/latest', async (request, reply) => {
    const params = ModelVersionParamsSchema.parse(request.params);
    const modelId = `${params.owner}/${params.name}`;

    const result = await model.latestVersion(modelId);
    if (!result.success) {
      return sendChatModelError(request, reply, result.error);
    }

    return reply.code(200).send({ model: modelId, version: result.data });
  });
}
