import 'reflect-metadata';
import { Constructor, ServiceIdentifier, ServiceLifetime } from './IContainer';
import { ContainerError } from './errors';

// Metadata keys
export const INJECTABLE_METADATA_KEY = Symbol('injectable');
export const INJECT_METADATA_KEY = Symbol('inject');
export const PARAM_TYPES_METADATA_KEY = 'design:paramtypes';

function isServiceIdentifier(value: unknown): value is ServiceIdentifier {
  return typeof value === 'string' || typeof value === 'symbol' || typeof value === 'function';
}

function isLifetime(value: unknown): value is ServiceLifetime {
  return value === ServiceLifetime.SINGLETON || value === ServiceLifetime.TRANSIENT;
}

function readArray(key: string | symbol, target: object): unknown[] {
  const value: unknown = Reflect.getMetadata(key, target);
  return Array.isArray(value) ? value : [];
}

/**
 * 标记类为可注入的
 */
export function Injectable(lifetime: ServiceLifetime = ServiceLifetime.TRANSIENT) {
  return function <T extends Constructor>(target: T): T {
    Reflect.defineMetadata(INJECTABLE_METADATA_KEY, { lifetime }, target);
    return target;
  };
}

/**
 * 注入特定的服务
 */
export function Inject(identifier: ServiceIdentifier) {
  return function (target: object, _propertyKey: string | symbol | undefined, parameterIndex: number): void {
    const existingTokens = readArray(INJECT_METADATA_KEY, target);
    existingTokens[parameterIndex] = identifier;
    Reflect.defineMetadata(INJECT_METADATA_KEY, existingTokens, target);
  };
}

/**
 * 标记为单例服务
 */
export function Singleton<T extends Constructor>(target: T): T {
  return Injectable(ServiceLifetime.SINGLETON)(target);
}

/**
 * 标记为瞬态服务（默认）
 */
export function Transient<T extends Constructor>(target: T): T {
  return Injectable(ServiceLifetime.TRANSIENT)(target);
}

/**
 * Constructor dependencies of a class: `@Inject` tokens first, then the
 * emitted parameter types.
 */
export function getDependencies(target: Constructor): ServiceIdentifier[] {
  const injectTokens = readArray(INJECT_METADATA_KEY, target);
  const paramTypes = readArray(PARAM_TYPES_METADATA_KEY, target);
  const count = Math.max(injectTokens.length, paramTypes.length);

  const dependencies: ServiceIdentifier[] = [];
  for (let i = 0; i < count; i++) {
    const token = injectTokens[i] ?? paramTypes[i];
    if (!isServiceIdentifier(token)) {
      throw new ContainerError(`Cannot determine constructor dependency #${i} of ${target.name || '[Anonymous Class]'}`);
    }
    dependencies.push(token);
  }

  return dependencies;
}

/**
 * 获取可注入元数据
 */
export function getInjectableMetadata(target: Constructor): { lifetime: ServiceLifetime } | null {
  const metadata: unknown = Reflect.getMetadata(INJECTABLE_METADATA_KEY, target);
  if (typeof metadata === 'object' && metadata !== null && 'lifetime' in metadata && isLifetime(metadata.lifetime)) {
    return { lifetime: metadata.lifetime };
  }
  return null;
}

// 服务标识符常量
export const SERVICE_IDENTIFIERS = {
  CONFIG: Symbol('Config'),
  CONFIG_TREE: Symbol('ConfigTree'),
  LOGGER: Symbol('Logger'),
  APP_IDENTITY: Symbol('AppIdentity')
} as const;

export type ServiceIdentifiers = typeof SERVICE_IDENTIFIERS;
