import Fastify from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { logger } from './middleware/logger.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { metricsMiddleware } from './middleware/metrics.js';
import { healthRoutes } from './routes/health.js';
import { chatRoutes } from './routes/chat.js';
import { modelRoutes } from './routes/models.js';
import { metricsRoutes } from './routes/metrics.js';
import { ReplicateChatModel } from './providers/index.js';
import { loadConfig, type AppConfig } from './config.js';

export interface BuildServerOptions {
  model?: ReplicateChatModel;
}

function createModel(config: AppConfig): ReplicateChatModel {
  return new ReplicateChatModel(config.replicate, { apiToken: config.apiToken });
}

async function buildServer(options: BuildServerOptions = {}) {
  const server = Fastify({
    logger: false,
    disableRequestLogging: true,
  });

  let model = options.model;
  if (!model) {
    const config = loadConfig();
    if (!config.success) {
      throw config.error;
    }
    model = createModel(config.data);
  }

  await server.register(cors);

  server.addHook('onRequest', requestIdMiddleware);
  server.addHook('onRequest', metricsMiddleware);

  await server.register(healthRoutes);
  await server.register(metricsRoutes);

  const chatModel = model;
  await server.register((instance) => chatRoutes(instance, chatModel));
  await server.register((instance) => modelRoutes(instance, chatModel));

  server.setErrorHandler((error, request, reply) => {
    logger.error({
      requestId: request.id,
      error: error.message,
      stack: error.stack,
    }, 'Request error');

    if (error instanceof ZodError) {
      reply.code(400).send({
        error: 'Validation error',
        details: error.errors,
      });
      return;
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      reply.code(error.statusCode).send({
        error: error.message,
        requestId: request.id,
      });
      return;
    }

    reply.code(500).send({
      error: 'Internal server error',
      requestId: request.id,
    });
  });

  return server;
}

async function main() {
  const config = loadConfig();
  if (!config.success) {
    logger.error({ issues: config.error.issues }, config.error.message);
    process.exit(1);
  }

  const server = await buildServer({ model: createModel(config.data) });

  logger.info({ port: config.data.port, model: config.data.replicate.model }, 'Starting server');

  try {
    await server.listen({ port: config.data.port, host: config.data.host });
  } catch (err) {
    logger.error({ error: err }, 'Server failed to start');
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err: unknown) => {
    logger.error({ error: err }, 'Server crashed');
    process.exit(1);
  });
}

export { buildServer };
