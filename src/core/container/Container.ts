import { AsyncLocalStorage } from 'async_hooks';
import {
  Constructor,
  ContainerOptions,
  DuplicatePolicy,
  IContainer,
  IDestroyable,
  ServiceDescriptor,
  ServiceFactory,
  ServiceIdentifier,
  ServiceLifetime
} from './IContainer';
import {
  CircularDependencyError,
  ContainerClosedError,
  ContainerError,
  DependencyResolutionError,
  DuplicateRegistrationError,
  UnresolvedDependencyError
} from './errors';
import { getDependencies, getInjectableMetadata } from './decorators';
import { log } from '../../utils/logger';

interface ServiceRecord<T> {
  descriptor: ServiceDescriptor<T>;
  cached?: { value: T };
  pending?: Promise<T>;
}

export interface ServiceSummary {
  lifetime: ServiceLifetime;
  dependencies: string[];
  hasInstance: boolean;
}

export function getIdentifierName(identifier: ServiceIdentifier): string {
  if (typeof identifier === 'string') {
    return identifier;
  }

  if (typeof identifier === 'symbol') {
    return identifier.toString();
  }

  return identifier.name || '[Anonymous Class]';
}

function isDestroyable(value: unknown): value is IDestroyable {
  return typeof value === 'object' && value !== null && 'destroy' in value && typeof value.destroy === 'function';
}

/**
 * Flat keyed registry with singleton and transient lifetimes.
 *
 * The chain of identifiers being resolved travels with the async call chain,
 * so a factory that (directly or through awaited factories) asks for a
 * service already under construction fails instead of deadlocking.
 */
export class Container implements IContainer {
  private services = new Map<ServiceIdentifier, ServiceRecord<unknown>>();
  private creationOrder: ServiceIdentifier[] = [];
  private readonly resolutionChain = new AsyncLocalStorage<ServiceIdentifier[]>();
  private readonly duplicatePolicy: DuplicatePolicy;
  private closed = false;

  constructor(options: ContainerOptions = {}) {
    this.duplicatePolicy = options.duplicatePolicy ?? DuplicatePolicy.REPLACE;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  register<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    lifetime?: ServiceLifetime
  ): IContainer {
    const descriptor: ServiceDescriptor<T> = {
      identifier,
      implementation,
      lifetime: lifetime ?? getInjectableMetadata(implementation)?.lifetime ?? ServiceLifetime.TRANSIENT,
      dependencies: getDependencies(implementation)
    };

    this.addDescriptor(descriptor);

    log.debug('Service registered', {
      identifier: getIdentifierName(identifier),
      lifetime: descriptor.lifetime,
      dependencies: descriptor.dependencies?.map(d => getIdentifierName(d))
    });

    return this;
  }

  registerFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    lifetime: ServiceLifetime = ServiceLifetime.TRANSIENT
  ): IContainer {
    this.addDescriptor({ identifier, factory, lifetime });

    log.debug('Factory registered', {
      identifier: getIdentifierName(identifier),
      lifetime
    });

    return this;
  }

  registerInstance<T>(identifier: ServiceIdentifier<T>, instance: T): IContainer {
    if (instance === undefined || instance === null) {
      throw new ContainerError(`Missing instance for ${getIdentifierName(identifier)}`, 'MISSING_INSTANCE');
    }
    if (typeof identifier === 'function' && !(instance instanceof identifier)) {
      throw new ContainerError(`Instance registered for ${getIdentifierName(identifier)} is not of that type`, 'TYPE_MISMATCH');
    }

    this.addDescriptor({ identifier, instance, lifetime: ServiceLifetime.SINGLETON });

    log.debug('Instance registered', {
      identifier: getIdentifierName(identifier)
    });

    return this;
  }

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    try {
      return this.resolveSync(identifier);
    } catch (error) {
      log.error('Service resolution failed', {
        identifier: getIdentifierName(identifier),
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  async resolveAsync<T>(identifier: ServiceIdentifier<T>): Promise<T> {
    try {
      return await this.resolveConcurrent(identifier);
    } catch (error) {
      log.error('Async service resolution failed', {
        identifier: getIdentifierName(identifier),
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  tryResolve<T>(identifier: ServiceIdentifier<T>): T | null {
    if (!this.closed && !this.isRegistered(identifier)) {
      return null;
    }
    return this.resolve(identifier);
  }

  isRegistered<T>(identifier: ServiceIdentifier<T>): boolean {
    return this.services.has(identifier);
  }

  getRegisteredServices(): ServiceIdentifier[] {
    return Array.from(this.services.keys());
  }

  getDescriptor<T>(identifier: ServiceIdentifier<T>): ServiceDescriptor<T> | null {
    return this.getRecord(identifier)?.descriptor ?? null;
  }

  purge(identifier?: ServiceIdentifier): void {
    this.assertOpen('purge');

    if (identifier === undefined) {
      this.services.clear();
      this.creationOrder = [];
      return;
    }

    this.services.delete(identifier);
    this.creationOrder = this.creationOrder.filter(id => id !== identifier);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    // 逆序销毁
    for (const identifier of [...this.creationOrder].reverse()) {
      const cached = this.services.get(identifier)?.cached;
      if (cached) {
        await this.destroyInstance(identifier, cached.value);
      }
    }

    this.services.clear();
    this.creationOrder = [];
    log.debug('Container closed');
  }

  private async destroyInstance(identifier: ServiceIdentifier, value: unknown): Promise<void> {
    if (!isDestroyable(value)) {
      return;
    }
    try {
      await value.destroy();
      log.debug('Service destroyed', { identifier: getIdentifierName(identifier) });
    } catch (error) {
      log.warn('Error destroying service', {
        identifier: getIdentifierName(identifier),
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  // Private methods

  private getRecord<T>(identifier: ServiceIdentifier<T>): ServiceRecord<T> | undefined {
    // records are keyed by the identifier they were registered under
    return this.services.get(identifier) as ServiceRecord<T> | undefined;
  }

  private addDescriptor<T>(descriptor: ServiceDescriptor<T>): void {
    this.assertOpen('register');

    const { identifier } = descriptor;
    if (this.services.has(identifier)) {
      if (this.duplicatePolicy === DuplicatePolicy.REJECT) {
        throw new DuplicateRegistrationError(getIdentifierName(identifier));
      }
      log.debug('Replacing service registration', { identifier: getIdentifierName(identifier) });
      this.creationOrder = this.creationOrder.filter(id => id !== identifier);
    }

    const record: ServiceRecord<T> = { descriptor };
    if (descriptor.instance !== undefined) {
      record.cached = { value: descriptor.instance };
    }
    this.services.set(identifier, record);
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new ContainerClosedError(operation);
    }
  }

  private lookup<T>(identifier: ServiceIdentifier<T>): ServiceRecord<T> {
    this.assertOpen(`resolve(${getIdentifierName(identifier)})`);

    const chain = this.resolutionChain.getStore() ?? [];
    if (chain.includes(identifier)) {
      throw new CircularDependencyError([...chain, identifier].map(getIdentifierName));
    }

    const record = this.getRecord(identifier);
    if (!record) {
      throw new UnresolvedDependencyError(getIdentifierName(identifier));
    }
    return record;
  }

  private withChain<R>(identifier: ServiceIdentifier, fn: () => R): R {
    const chain = this.resolutionChain.getStore() ?? [];
    return this.resolutionChain.run([...chain, identifier], fn);
  }

  private resolveSync<T>(identifier: ServiceIdentifier<T>): T {
    const record = this.lookup(identifier);
    if (record.cached) {
      return record.cached.value;
    }

    const name = getIdentifierName(identifier);
    if (record.pending) {
      throw new DependencyResolutionError(name, 'singleton is still being created asynchronously');
    }

    const value = this.withChain(identifier, () => this.createInstance(record.descriptor));
    if (value instanceof Promise) {
      // the factory already ran; keep its rejection from going unhandled
      value.catch((error: unknown) => log.warn('Discarded async factory result failed', { identifier: name, error }));
      throw new DependencyResolutionError(name, 'factory returns a Promise but sync resolution was requested');
    }

    if (record.descriptor.lifetime === ServiceLifetime.SINGLETON) {
      this.cache(identifier, record, value);
    }
    return value;
  }

  private resolveConcurrent<T>(identifier: ServiceIdentifier<T>): Promise<T> {
    const record = this.lookup(identifier);
    if (record.cached) {
      return Promise.resolve(record.cached.value);
    }

    if (record.descriptor.lifetime !== ServiceLifetime.SINGLETON) {
      return this.withChain(identifier, () => this.createInstanceAsync(record.descriptor));
    }

    if (!record.pending) {
      record.pending = this.withChain(identifier, () => this.createInstanceAsync(record.descriptor))
        .then(async value => {
          if (this.closed) {
            // closed while creating: nothing will own this instance
            await this.destroyInstance(identifier, value);
            throw new ContainerClosedError(`resolve(${getIdentifierName(identifier)})`);
          }
          this.cache(identifier, record, value);
          return value;
        })
        .finally(() => {
          record.pending = undefined;
        });
    }
    return record.pending;
  }

  private cache<T>(identifier: ServiceIdentifier<T>, record: ServiceRecord<T>, value: T): void {
    // a replaced registration must not receive the old entry's instance
    if (this.services.get(identifier) !== record) {
      return;
    }
    record.cached = { value };
    this.creationOrder.push(identifier);
  }

  private createInstance<T>(descriptor: ServiceDescriptor<T>): T | Promise<T> {
    if (descriptor.factory) {
      return descriptor.factory(this);
    }

    if (descriptor.implementation) {
      const dependencies = (descriptor.dependencies ?? []).map(dep => this.resolveSync(dep));
      return new descriptor.implementation(...dependencies);
    }

    throw new DependencyResolutionError(getIdentifierName(descriptor.identifier), 'no factory or implementation');
  }

  private async createInstanceAsync<T>(descriptor: ServiceDescriptor<T>): Promise<T> {
    if (descriptor.factory) {
      return descriptor.factory(this);
    }

    if (descriptor.implementation) {
      const dependencies = await Promise.all((descriptor.dependencies ?? []).map(dep => this.resolveConcurrent(dep)));
      return new descriptor.implementation(...dependencies);
    }

    throw new DependencyResolutionError(getIdentifierName(descriptor.identifier), 'no factory or implementation');
  }

  // Debug methods

  describe(): Record<string, ServiceSummary> {
    const tree: Record<string, ServiceSummary> = {};

    for (const [identifier, record] of this.services) {
      tree[getIdentifierName(identifier)] = {
        lifetime: record.descriptor.lifetime,
        dependencies: record.descriptor.dependencies?.map(d => getIdentifierName(d)) ?? [],
        hasInstance: record.cached !== undefined
      };
    }

    return tree;
  }

  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (const [identifier, record] of this.services) {
      const { descriptor } = record;
      if (!descriptor.implementation && !descriptor.factory && descriptor.instance === undefined) {
        errors.push(`Service ${getIdentifierName(identifier)} has no implementation, factory, or instance`);
      }

      for (const dep of descriptor.dependencies ?? []) {
        if (!this.isRegistered(dep)) {
          errors.push(`Service ${getIdentifierName(identifier)} depends on unregistered service ${getIdentifierName(dep)}`);
        }
      }
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }
}
