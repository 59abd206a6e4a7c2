export type Constructor<T = unknown> = new (...args: any[]) => T;

export type ServiceIdentifier<T = unknown> = string | symbol | Constructor<T>;

export type ServiceFactory<T> = (container: IContainer) => T | Promise<T>;

export enum ServiceLifetime {
  TRANSIENT = 'transient',   // 每次解析都创建新实例
  SINGLETON = 'singleton'    // 首次解析后缓存
}

/**
 * What `register*` does when the identifier is already registered.
 */
export enum DuplicatePolicy {
  /** Last registration wins; a cached singleton of the old entry is dropped. */
  REPLACE = 'replace',
  /** Re-registration throws `DuplicateRegistrationError`. */
  REJECT = 'reject'
}

export interface ContainerOptions {
  duplicatePolicy?: DuplicatePolicy;
}

export interface ServiceDescriptor<T = unknown> {
  identifier: ServiceIdentifier<T>;
  implementation?: Constructor<T>;
  factory?: ServiceFactory<T>;
  instance?: T;
  lifetime: ServiceLifetime;
  dependencies?: ServiceIdentifier[];
}

/**
 * Services the container disposes of when it is closed.
 */
export interface IDestroyable {
  destroy(): void | Promise<void>;
}

export interface IContainer {
  /**
   * 注册类，构造函数依赖来自 @Inject / design:paramtypes 元数据
   */
  register<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    lifetime?: ServiceLifetime
  ): IContainer;

  /**
   * 注册工厂函数
   */
  registerFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    lifetime?: ServiceLifetime
  ): IContainer;

  /**
   * 注册单例实例
   */
  registerInstance<T>(
    identifier: ServiceIdentifier<T>,
    instance: T
  ): IContainer;

  /**
   * 解析服务
   */
  resolve<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * 异步解析服务，单例的并发首次解析共享同一次创建
   */
  resolveAsync<T>(identifier: ServiceIdentifier<T>): Promise<T>;

  /**
   * 尝试解析服务，未注册时返回 null
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | null;

  isRegistered<T>(identifier: ServiceIdentifier<T>): boolean;

  getRegisteredServices(): ServiceIdentifier[];

  getDescriptor<T>(identifier: ServiceIdentifier<T>): ServiceDescriptor<T> | null;

  /**
   * Removes one registration, or every registration when called without an identifier.
   */
  purge(identifier?: ServiceIdentifier): void;

  /**
   * Destroys cached singletons; every later operation fails.
   */
  close(): Promise<void>;

  readonly isClosed: boolean;
}
