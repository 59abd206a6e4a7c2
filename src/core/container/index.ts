// Core interfaces and types
export type {
  IContainer,
  IDestroyable,
  Constructor,
  ContainerOptions,
  ServiceIdentifier,
  ServiceDescriptor,
  ServiceFactory
} from './IContainer';
export { ServiceLifetime, DuplicatePolicy } from './IContainer';

// Container implementation
export { Container, getIdentifierName } from './Container';
export type { ServiceSummary } from './Container';

// Service registry
export { ServiceRegistry } from './ServiceRegistry';
export type { CoreServices } from './ServiceRegistry';

// Errors
export {
  ContainerError,
  UnresolvedDependencyError,
  DuplicateRegistrationError,
  CircularDependencyError,
  DependencyResolutionError,
  ContainerClosedError
} from './errors';

// Decorators
export {
  Injectable,
  Inject,
  Singleton,
  Transient,
  getDependencies,
  getInjectableMetadata,
  SERVICE_IDENTIFIERS
} from './decorators';

export type { ServiceIdentifiers } from './decorators';
