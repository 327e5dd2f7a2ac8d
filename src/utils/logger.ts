import winston from 'winston';
import path from 'path';
import { config } from './config';

const logDir = path.dirname(config.logging.file);

const SERVICE_NAME = 'java-code-graph';

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
    // Keep console lines short: counts and paths, not whole option bags
    const essentialMeta = Object.keys(meta).filter(
      key => !['service', 'component', 'options'].includes(key)
    );

    let output = `${String(timestamp)} [${level}]: ${String(message)}`;

    if (typeof component === 'string' && component !== SERVICE_NAME) {
      output += ` (${component})`;
    }

    if (essentialMeta.length > 0) {
      const essentialData = essentialMeta.reduce<Record<string, unknown>>((acc, key) => {
        acc[key] = meta[key];
        return acc;
      }, {});

      const serialized = JSON.stringify(essentialData);
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
  defaultMeta: { service: SERVICE_NAME },
  transports: [
    new winston.transports.File({
      filename: config.logging.file,
      maxsize: 5 * 1024 * 1024, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    }),
  ],
});

if (config.nodeEnv !== 'production' && config.nodeEnv !== 'test') {
  logger.add(
    new winston.transports.Console({
      format: consoleFormat,
      level: 'info', // debug goes to file only
    })
  );
}

export const createComponentLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};

export const flushLogs = async (): Promise<void> => {
  return new Promise(resolve => {
    setImmediate(() => {
      setTimeout(resolve, 200);
    });
  });
};
