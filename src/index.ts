import 'reflect-metadata';

export * from './conf';
export * from './core';

export { loadSettings, settings } from './config';
export type { Settings } from './config';

export { AppError, SettingsError, handleError, setupGlobalErrorHandling } from './utils/errors';
export type { AppErrorOptions } from './utils/errors';
export { log, createContextLogger } from './utils/logger';
export type { LogIdentity } from './utils/logger';
