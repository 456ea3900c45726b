import pino from 'pino';
import pretty from 'pino-pretty';

let rootLogger: pino.Logger | null = null;

const createLogger = (): pino.Logger => {
  const environment = process.env.NODE_ENV ?? 'development';
  const isProduction = environment === 'production';
  const defaultLevel = environment === 'test' ? 'silent' : 'info';

  const loggerConfig: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL ?? defaultLevel,
    base: {
      service: 'smart-files',
      environment,
    },
  };

  if (!isProduction) {
    // stderr keeps stdout free for prompts and command output
    const prettyStream = pretty({
      colorize: true,
      singleLine: true,
      translateTime: 'yyyy-mm-dd HH:MM:ss',
      ignore: 'pid,hostname',
      destination: process.stderr,
    });

    return pino(loggerConfig, prettyStream);
  }

  return pino(loggerConfig);
};

/**
 * Process-wide logger; the output stream is created on first use only.
 * Pass a component name to get a child bound to it.
 */
export const getLogger = (component?: string): pino.Logger => {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return component ? rootLogger.child({ component }) : rootLogger;
};
