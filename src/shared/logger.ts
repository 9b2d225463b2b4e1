import pino, { type Logger, type DestinationStream } from 'pino';

export function createRootLogger(destination?: DestinationStream): Logger {
  const options = {
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

const logger = createRootLogger();

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export type { Logger };

export default logger;
