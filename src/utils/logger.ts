import pino from 'pino';

// stdout carries the rendered outline, so every log line goes to stderr.
const STDERR = 2;

let baseLogger: pino.Logger | undefined;

function buildBaseLogger(level: pino.LevelWithSilent): pino.Logger {
  // Components log failures under `error`; give it the same treatment as pino's `err`
  const serializers = { error: pino.stdSerializers.err };

  if (process.env.NODE_ENV === 'development') {
    return pino({
      level,
      serializers,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: STDERR,
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level, serializers }, pino.destination(STDERR));
}

/**
 * Rebuild the base logger at a validated level.
 * Loggers handed out earlier keep the level they were created with.
 */
export function configureLogger(level: pino.LevelWithSilent): void {
  baseLogger = buildBaseLogger(level);
}

function getBaseLogger(): pino.Logger {
  if (!baseLogger) {
    baseLogger = buildBaseLogger('info');
  }
  return baseLogger;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return getBaseLogger().child({ ...context });
}
