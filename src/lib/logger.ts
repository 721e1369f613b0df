type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const formatMessage = (level: LogLevel, message: string): string => {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
};

const formatMeta = (meta: unknown): string => {
  if (meta instanceof Error) return meta.stack || meta.message;
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
};

export const logger = {
  debug: (message: string, meta?: unknown): void => {
    if (process.env.LOG_LEVEL === 'debug') {
      console.debug(formatMessage('debug', message));
      if (meta !== undefined) console.debug(formatMeta(meta));
    }
  },
  info: (message: string, meta?: unknown): void => {
    console.info(formatMessage('info', message));
    if (meta !== undefined) console.info(formatMeta(meta));
  },
  warn: (message: string, meta?: unknown): void => {
    console.warn(formatMessage('warn', message));
    if (meta !== undefined) console.warn(formatMeta(meta));
  },
  error: (message: string, error?: unknown): void => {
    console.error(formatMessage('error', message));
    if (error !== undefined) {
      console.error(formatMeta(error));
    }
  },
};
