import pino from 'pino';

const enablePretty =
  process.env['LOG_PRETTY'] === '1' ||
  (process.env['NODE_ENV'] !== 'production' && process.env['NODE_ENV'] !== 'test' && process.stdout.isTTY);

const level = process.env['LOG_LEVEL'] ?? (process.env['NODE_ENV'] === 'test' ? 'silent' : 'info');

let logger: ReturnType<typeof pino>;

if (enablePretty) {
  try {
    logger = pino({
      level,
      transport: {
        // optional dependency; may not be installed
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          singleLine: false,
        },
      },
    });
  } catch {
    // Fallback if pino-pretty is not installed or cannot be resolved
    logger = pino({ level });
  }
} else {
  logger = pino({ level });
}

export { logger };
