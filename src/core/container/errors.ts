import { AppError } from '../../utils/errors';

export class ContainerError extends AppError {
  constructor(message: string, code: string = 'CONTAINER_ERROR') {
    super(message, code);
    this.name = 'ContainerError';
  }
}

export class UnresolvedDependencyError extends ContainerError {
  constructor(public readonly key: string) {
    super(`Service not registered: ${key}`, 'UNRESOLVED_DEPENDENCY');
    this.name = 'UnresolvedDependencyError';
  }
}

export class DuplicateRegistrationError extends ContainerError {
  constructor(public readonly key: string) {
    super(`Service already registered: ${key}`, 'DUPLICATE_REGISTRATION');
    this.name = 'DuplicateRegistrationError';
  }
}

export class CircularDependencyError extends ContainerError {
  constructor(public readonly chain: readonly string[]) {
    super(`Circular dependency detected: ${chain.join(' -> ')}`, 'CIRCULAR_DEPENDENCY');
    this.name = 'CircularDependencyError';
  }
}

export class DependencyResolutionError extends ContainerError {
  constructor(public readonly key: string, reason: string) {
    super(`Unable to resolve ${key}: ${reason}`, 'DEPENDENCY_RESOLUTION_FAILED');
    this.name = 'DependencyResolutionError';
  }
}

export class ContainerClosedError extends ContainerError {
  constructor(operation: string) {
    super(`Container is closed (attempted ${operation})`, 'CONTAINER_CLOSED');
    this.name = 'ContainerClosedError';
  }
}
