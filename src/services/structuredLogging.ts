import pino from 'pino';
import { config } from '../config';

export type LogCategory = 'shows' | 'settings' | 'indexer' | 'scheduler' | 'http';

export interface LogMeta {
  showId?: number;
  details?: Record<string, unknown>;
}

const base = pino({
  level: config.logLevel,
  base: { app: 'showshelf' },
});

function write(level: 'debug' | 'info' | 'warn' | 'error', category: LogCategory, message: string, meta: LogMeta = {}) {
  base[level]({ category, ...meta }, message);
}

export const logger = {
  debug: (category: LogCategory, message: string, meta?: LogMeta) => write('debug', category, message, meta),
  info: (category: LogCategory, message: string, meta?: LogMeta) => write('info', category, message, meta),
  warn: (category: LogCategory, message: string, meta?: LogMeta) => write('warn', category, message, meta),
  error: (category: LogCategory, message: string, meta?: LogMeta) => write('error', category, message, meta),
};
