import { ReplicateChatModel } from './replicate.js';

export { ReplicateChatModel };
export { renderMessage, renderPrompt } from './prompt.js';
export * from './errors.js';
export type {
  ChatModel,
  ChatCallOptions,
  ChatResult,
  Message,
  AssistantMessage,
  FunctionDescriptor,
  ResultObserver,
  Result,
} from './base.js';
