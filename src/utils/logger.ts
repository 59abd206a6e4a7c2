import winston from 'winston';
import path from 'path';

// 日志级别配置
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4
};

const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white'
};

winston.addColors(colors);

export type LogLevel = keyof typeof levels;

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'debug'];

/**
 * Identity fields a context logger stamps on every record.
 */
export interface LogIdentity {
  appId: string;
  instanceTag: string;
  environmentName: string;
}

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const tag = info.app ? ` [${info.app}/${info.instance}@${info.env}]` : '';
    return `${info.timestamp}${tag} ${info.level}: ${info.message}`;
  })
);

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.json()
);

function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({ format: consoleFormat })
  ];

  // 文件传输只在配置了日志目录时启用
  const logDir = process.env.LOG_DIR;
  if (logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'app.log'),
        format: jsonFormat
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        format: jsonFormat
      })
    );
  }

  return transports;
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  levels,
  transports: createTransports(),
  silent: process.env.NODE_ENV === 'test',
  exitOnError: false
});

export default logger;

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export const log = {
  error: (message: string, meta?: unknown) => logger.error(message, meta),
  warn: (message: string, meta?: unknown) => logger.warn(message, meta),
  info: (message: string, meta?: unknown) => logger.info(message, meta),
  http: (message: string, meta?: unknown) => logger.http(message, meta),
  debug: (message: string, meta?: unknown) => logger.debug(message, meta),
};

/**
 * Child logger that tags records with the running application's identity.
 */
export function createContextLogger(identity: LogIdentity): winston.Logger {
  return logger.child({
    app: identity.appId,
    instance: identity.instanceTag,
    env: identity.environmentName
  });
}
