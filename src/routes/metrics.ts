import type { FastifyInstance } from 'fastify';
import { getMetrics, getMetricsContentType } from '../middleware/metrics.js';

export async function metricsRoutes(app: FastifyInstance): Promise<void> {
  app.get('/metrics', async (_request, reply) => {
    return reply
      .type(getMetricsContentType())
      .send(await getMetrics());
  });
}
