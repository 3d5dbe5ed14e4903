import type { Message } from './base.js';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant.';

export interface RenderedPrompt {
  systemPrompt: string;
  prompt: string;
}

/**
 * Llama 2 chat encoding: user turns are sent as-is and earlier assistant turns
 * are wrapped in instruction delimiters.
 */
export function renderMessage(message: Message): string {
  switch (message.role) {
    case 'system':
    case 'user':
      return message.content;
    case 'assistant':
      return `[INST] ${message.content} [/INST]`;
    default: {
      const unknown: never = message;
      throw new Error(`Cannot render message with role: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Splits out the system prompt and renders the remaining turns one per line.
 * Only the first system message is used; any later ones are dropped.
 */
export function renderPrompt(messages: readonly Message[]): RenderedPrompt {
  const systemMessages = messages.filter(m => m.role === 'system');
  const chatMessages = messages.filter(m => m.role !== 'system');

  return {
    systemPrompt: systemMessages[0] ? renderMessage(systemMessages[0]) : '',
    prompt: chatMessages.map(renderMessage).join('\n'),
  };
}

export function toMessages(input: string | Message[]): Message[] {
  if (typeof input === 'string') {
    return [
      { role: 'system', content: DEFAULT_SYSTEM_PROMPT },
      { role: 'user', content: input },
    ];
  }
  return input;
}
