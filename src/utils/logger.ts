import path from 'path';
import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp: ts, module: mod, ...meta }) => {
  const moduleTag = mod ? `[${mod}]` : '';
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${ts} ${level} ${moduleTag} ${message}${metaStr}`;
});

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: combine(colorize(), timestamp({ format: 'HH:mm:ss.SSS' }), logFormat),
    }),
  ];

  // File logs only when LOG_DIR is set
  const logDir = process.env.LOG_DIR;
  if (logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'sync-check.log'),
        maxsize: 10_000_000, // 10MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'errors.log'),
        level: 'error',
        maxsize: 10_000_000,
        maxFiles: 3,
      }),
    );
  }

  return transports;
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: combine(
    timestamp({ format: 'HH:mm:ss.SSS' }),
    logFormat
  ),
  transports: buildTransports(),
});

export function createModuleLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}
