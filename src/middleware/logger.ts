import { pino } from 'pino';

export const logger = pino({
  name: 'replicate-chat-gateway',
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
});

export type Logger = typeof logger;
