import type { ChatModelError } from './errors.js';
import type { ResponseOverride } from '../services/response-override.js';

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export type MessageStatus = 'complete' | 'length' | 'cancelled';

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  status?: MessageStatus;
}

export type Message = SystemMessage | UserMessage | AssistantMessage;

export type Role = Message['role'];

/**
 * A callable tool the caller would like the model to use. Replicate-hosted
 * models cannot call tools, so only its presence is ever inspected.
 */
export interface FunctionDescriptor {
  name: string;
  description?: string;
  parameters?: Record<string, unknown>;
}

export type Result<T, E = ChatModelError> =
  | { success: true; data: T }
  | { success: false; error: E };

export type ChatResult = Result<AssistantMessage>;

/**
 * Receives the normalized result once the prediction reaches a terminal state.
 * Whatever it returns (or throws) is ignored.
 */
export type ResultObserver = (result: ChatResult) => unknown;

export interface ChatCallOptions {
  functions?: FunctionDescriptor[];
  onResult?: ResultObserver;
  signal?: AbortSignal;
  override?: ResponseOverride;
}

export interface ChatModel {
  name: string;
  call(input: string | Message[], options?: ChatCallOptions): Promise<ChatResult>;
}

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}
