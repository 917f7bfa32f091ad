import pino, { type Logger } from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

export const logger: Logger = pino({
  name: 'pitchside-engine',
  level: process.env.ENGINE_LOG_LEVEL ?? (isTest ? 'silent' : 'info')
});

export type { Logger };
