import { destination, pino, type Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// stdout carries command output only
export const makeLogger = (level: LogLevel = 'warn'): Logger =>
  pino({ name: 'cairn', level, base: null }, destination(2));

export const silentLogger: Logger = pino({ level: 'silent' });
