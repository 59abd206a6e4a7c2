// Application context
export { ApplicationContext, ContextState, resetApplicationContext } from './ApplicationContext';
export type { ApplicationContextOptions, ContextReadyCallback } from './ApplicationContext';
export { DuplicateInitializationError, ContextInitializationError } from './errors';

// Identity
export { createIdentity, resolveEnvironmentName, DEFAULT_APP_ID, DEFAULT_ENVIRONMENT } from './identity';
export type { ApplicationIdentity } from './identity';

// Bootstrap
export { ApplicationBootstrap } from './ApplicationBootstrap';
export type { BootstrapOptions } from './ApplicationBootstrap';

// Container system
export * from './container';
