import { fail, ok } from '../../src/providers/base.js';
import { TransportError } from '../../src/providers/errors.js';
import type {
  PredictionRequest,
  PredictionTransport,
  RequestOptions,
  TransportResult,
} from '../../src/services/prediction-transport.js';

type Reply = unknown | TransportError;

function toResult(reply: Reply): TransportResult {
  return reply instanceof TransportError ? fail(reply) : ok(reply);
}

/**
 * In-memory stand-in for Replicate. Status replies are served in order; the
 * last one repeats once the queue is exhausted.
 */
export class FakeTransport implements PredictionTransport {
  created: PredictionRequest[] = [];
  polled: string[] = [];
  versionLookups: string[] = [];
  requestOptions: RequestOptions[] = [];

  private createReply: Reply;
  private statusReplies: Reply[];
  private versionsReply: Reply;

  constructor(options: { create?: Reply; statuses?: Reply[]; versions?: Reply } = {}) {
    this.createReply = options.create ?? { id: 'pred-1' };
    this.statusReplies = options.statuses ?? [];
    this.versionsReply = options.versions ?? { results: [] };
  }

  async createPrediction(body: PredictionRequest, options: RequestOptions): Promise<TransportResult> {
    this.created.push(body);
    this.requestOptions.push(options);
    return toResult(this.createReply);
  }

  async getPrediction(id: string, options: RequestOptions): Promise<TransportResult> {
    this.polled.push(id);
    this.requestOptions.push(options);
    const reply = this.statusReplies.length > 1 ? this.statusReplies.shift() : this.statusReplies[0];
    return toResult(reply);
  }

  async listModelVersions(modelId: string, options: RequestOptions): Promise<TransportResult> {
    this.versionLookups.push(modelId);
    this.requestOptions.push(options);
    return toResult(this.versionsReply);
  }
}

export const FAST_POLLING = { initialDelay: 1, maxDelay: 2, factor: 2, deadline: 1000 };
