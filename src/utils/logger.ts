import config, { type LogLevel } from '../config';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const enabled = (level: Exclude<LogLevel, 'silent'>): boolean =>
  SEVERITY[level] >= SEVERITY[config.LOG_LEVEL];

const format = (data: unknown): string => (data === undefined ? '' : JSON.stringify(data));

/**
 * Console logger tagging every line with its level and the calling context,
 * e.g. `[INFO][ProductService] Creating Hat`.
 */
export const logger = {
  debug: (context: string, message: string, data?: unknown) => {
    if (enabled('debug')) console.log(`[DEBUG][${context}] ${message}`, format(data));
  },
  info: (context: string, message: string, data?: unknown) => {
    if (enabled('info')) console.log(`[INFO][${context}] ${message}`, format(data));
  },
  warn: (context: string, message: string, data?: unknown) => {
    if (enabled('warn')) console.warn(`[WARN][${context}] ${message}`, format(data));
  },
  error: (context: string, message: string, error?: unknown) => {
    if (enabled('error')) console.error(`[ERROR][${context}] ${message}`, error ?? '');
  },
};

export default logger;
