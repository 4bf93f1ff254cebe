import pino from 'pino';

const env = process.env.NODE_ENV ?? 'production';
const isDev = env === 'development';

function createLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || 'info';

  // pino-pretty runs in a worker thread; errors are routed to stderr through a
  // second target, dedupe keeps a record from being written twice.
  if (isDev) {
    return pino({
      level,
      transport: {
        targets: [
          {
            target: 'pino-pretty',
            level: 'trace',
            options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname', destination: 1 },
          },
          {
            target: 'pino-pretty',
            level: 'error',
            options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname', destination: 2 },
          },
        ],
        dedupe: true,
      },
    });
  }

  const streams: pino.StreamEntry[] = [
    { level: 'trace', stream: process.stdout },
    { level: 'error', stream: process.stderr },
  ];

  return pino({ level }, pino.multistream(streams, { dedupe: true }));
}

export const logger = createLogger();

export function createChildLogger(name: string): pino.Logger {
  return logger.child({ module: name });
}

export type Logger = pino.Logger;
