import { log } from './logger';

export interface AppErrorOptions {
  cause?: unknown;
  isOperational?: boolean;
}

// 自定义错误基类
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string = 'APP_ERROR', options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AppError';
    this.code = code;
    this.isOperational = options.isOperational ?? true;

    Error.captureStackTrace(this, this.constructor);
  }
}

// 设置错误类
export class SettingsError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_SETTING');
    this.name = 'SettingsError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// 错误处理
export function handleError(error: Error, context?: string): void {
  const errorContext = context ? `[${context}] ` : '';

  if (error instanceof AppError && error.isOperational) {
    log.warn(`${errorContext}${error.message}`, {
      code: error.code,
      stack: error.stack
    });
  } else {
    log.error(`${errorContext}${error.message}`, {
      stack: error.stack,
      name: error.name
    });
  }
}

// 全局未捕获异常处理
export function setupGlobalErrorHandling(): void {
  process.on('uncaughtException', (error: Error) => {
    log.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    log.error('Unhandled promise rejection', { reason });
    process.exit(1);
  });
}
