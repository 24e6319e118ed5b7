import winston from 'winston';
import path from 'path';
import { config } from './config';

const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({
    format: 'HH:mm:ss',
  }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const extraKeys = Object.keys(meta).filter(key => key !== 'service');

    let output = `${timestamp} [${level}]: ${message}`;

    if (component && component !== 'rtl-graph') {
      output += ` (${component})`;
    }

    if (extraKeys.length > 0) {
      const extra: Record<string, unknown> = {};
      for (const key of extraKeys) {
        extra[key] = meta[key];
      }
      // Only show if it's small and useful
      const serialized = JSON.stringify(extra);
      if (serialized.length < 200) {
        output += ` ${serialized}`;
      }
    }

    return output;
  })
);

export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  defaultMeta: { service: 'rtl-graph' },
  silent: config.nodeEnv === 'test',
  transports: [
    // stderr keeps stdout free for the render model
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
});

if (config.logging.file) {
  const logDir = path.dirname(config.logging.file);
  logger.add(
    new winston.transports.File({
      filename: config.logging.file,
      maxsize: 5 * 1024 * 1024, // 5MB
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    })
  );
}

// Create child loggers for different components
export const createComponentLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};

export const setLogLevel = (level: string): void => {
  logger.level = level;
  for (const transport of logger.transports) {
    transport.level = level;
  }
};

export const flushLogs = async (): Promise<void> => {
  return new Promise(resolve => {
    setImmediate(() => {
      setTimeout(resolve, 50);
    });
  });
};
