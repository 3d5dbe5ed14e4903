export type ChatModelErrorKind =
  | 'configuration'
  | 'unsupported_feature'
  | 'transport'
  | 'remote_job'
  | 'malformed_response'
  | 'polling_halted';

export class ChatModelError extends Error {
  readonly kind: ChatModelErrorKind;

  constructor(kind: ChatModelErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChatModelError';
    this.kind = kind;
  }
}

export class ConfigurationError extends ChatModelError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('configuration', message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class UnsupportedFeatureError extends ChatModelError {
  constructor(message: string) {
    super('unsupported_feature', message);
    this.name = 'UnsupportedFeatureError';
  }
}

export class TransportError extends ChatModelError {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, options: { status?: number; retryable: boolean; cause?: unknown }) {
    super('transport', message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
    this.retryable = options.retryable;
  }
}

export class RemoteJobError extends ChatModelError {
  readonly status: 'failed' | 'canceled';

  constructor(message: string, status: 'failed' | 'canceled') {
    super('remote_job', message);
    this.name = 'RemoteJobError';
    this.status = status;
  }
}

export class MalformedResponseError extends ChatModelError {
  constructor(message: string) {
    super('malformed_response', message);
    this.name = 'MalformedResponseError';
  }
}

export class PollingHaltedError extends ChatModelError {
  readonly reason: 'deadline' | 'aborted';

  constructor(message: string, reason: 'deadline' | 'aborted') {
    super('polling_halted', message);
    this.name = 'PollingHaltedError';
    this.reason = reason;
  }
}

export function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 429;
}
