import { AppError } from '../utils/errors';

export class DuplicateInitializationError extends AppError {
  constructor(public readonly state: string) {
    super(`Application context already created (state: ${state})`, 'DUPLICATE_INITIALIZATION');
    this.name = 'DuplicateInitializationError';
  }
}

export class ContextInitializationError extends AppError {
  constructor(cause: Error | null) {
    super(
      `Application context initialization failed earlier in this process${cause ? `: ${cause.message}` : ''}`,
      'CONTEXT_INITIALIZATION_FAILED',
      { cause: cause ?? undefined, isOperational: false }
    );
    this.name = 'ContextInitializationError';
  }
}
