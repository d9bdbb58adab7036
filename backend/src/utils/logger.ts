export interface Logger {
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

const debugEnabled = () => process.env.LOG_LEVEL === 'debug';

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info(message, meta) {
      if (meta !== undefined) {
        console.log(`${prefix} ${message}`, meta);
        return;
      }
      console.log(`${prefix} ${message}`);
    },
    warn(message, meta) {
      if (meta !== undefined) {
        console.warn(`${prefix} ${message}`, meta);
        return;
      }
      console.warn(`${prefix} ${message}`);
    },
    error(message, meta) {
      if (meta !== undefined) {
        console.error(`${prefix} ${message}`, meta);
        return;
      }
      console.error(`${prefix} ${message}`);
    },
    debug(message, meta) {
      if (!debugEnabled()) {
        return;
      }
      if (meta !== undefined) {
        console.debug(`${prefix} ${message}`, meta);
        return;
      }
      console.debug(`${prefix} ${message}`);
    }
  };
}
