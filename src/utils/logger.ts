import pino from 'pino';

// stdout carries decoded records, so every log line goes to stderr
export function createLogger(verbose = false) {
  const level = verbose ? 'debug' : 'info';

  if (process.env.NODE_ENV !== 'production') {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}

export type Logger = ReturnType<typeof createLogger>;
