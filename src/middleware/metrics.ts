/**
 * Prometheus metrics for the HTTP surface and the prediction lifecycle.
 */

import client from 'prom-client';
import type { FastifyRequest, FastifyReply, HookHandlerDoneFunction } from 'fastify';

// Create a Registry to register metrics
const register = new client.Registry();

// Default metrics (CPU, memory, etc.)
client.collectDefaultMetrics({ register });

// HTTP request metrics
const httpRequestDuration = new client.Histogram({
  name: 'replicate_gateway_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

const httpRequestTotal = new client.Counter({
  name: 'replicate_gateway_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

// Prediction lifecycle metrics
const predictionDuration = new client.Histogram({
  name: 'replicate_gateway_prediction_duration_seconds',
  help: 'Time from prediction submission to its final outcome in seconds',
  labelNames: ['model', 'outcome'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 120, 300],
  registers: [register],
});

const predictionPolls = new client.Counter({
  name: 'replicate_gateway_prediction_polls_total',
  help: 'Total number of prediction status fetches',
  labelNames: ['status'],
  registers: [register],
});

/**
 * Metrics middleware for Fastify.
 */
export function metricsMiddleware(
  request: FastifyRequest,
  reply: FastifyReply,
  done: HookHandlerDoneFunction
): void {
  const startTime = Date.now();

  reply.raw.on('finish', () => {
    const duration = (Date.now() - startTime) / 1000;
    const route = request.routeOptions?.url ?? request.url;
    const labels = {
      method: request.method,
      route,
      status_code: reply.statusCode.toString(),
    };

    httpRequestDuration.observe(labels, duration);
    httpRequestTotal.inc(labels);
  });

  done();
}

/**
 * Track how long a prediction took to reach its outcome
 * (`succeeded`, `failed`, `canceled`, or an error kind).
 */
export function trackPrediction(model: string, outcome: string, durationSeconds: number): void {
  predictionDuration.observe({ model, outcome }, durationSeconds);
}

/**
 * Track a single status fetch and the status it observed.
 */
export function trackPoll(status: string): void {
  predictionPolls.inc({ status });
}

/**
 * Get metrics in Prometheus format.
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get metrics content type.
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

export { register };
