import pino, { type LoggerOptions, type Logger } from 'pino';

const nodeEnv = process.env['NODE_ENV'] ?? 'development';
const isTest = nodeEnv === 'test';
const isDev = nodeEnv === 'development';

// stdout is reserved for command output (CLI results, --json documents)
export const LOG_FD = 2;

const options: LoggerOptions = {
  name: 'updater',
  level: process.env['LOG_LEVEL'] ?? (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
  redact: {
    paths: ['token', 'apiKey', '*.token', '*.apiKey', 'headers.authorization', 'headers["x-api-key"]'],
    censor: '[redacted]',
  },
};

// Pretty output only for interactive development
if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: LOG_FD,
    },
  };
}

export const logger = isDev ? pino(options) : pino(options, pino.destination(LOG_FD));

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
