import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

const LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LEVELS)[number];

// Custom format: stack-scoped messages carry the stack id before the text
const stackpilotFormat = printf(({ level, message, timestamp, stackId, ...metadata }) => {
  const scope = typeof stackId === 'string' ? ` [${stackId}]` : '';
  let msg = `${String(timestamp)} [${level}]${scope}: ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

const requestedLevel = process.env.LOG_LEVEL ?? 'info';

export const logger = winston.createLogger({
  level: requestedLevel === 'silent' ? 'error' : requestedLevel,
  silent: requestedLevel === 'silent',
  format: combine(timestamp(), colorize(), stackpilotFormat),
  transports: [
    // stdout is reserved for command output
    new winston.transports.Console({ stderrLevels: [...LEVELS] }),
  ],
});

export const setLogLevel = (level: LogLevel): void => {
  logger.level = level;
};

export const createStackLogger = (stackId: string): winston.Logger =>
  logger.child({ stackId });
