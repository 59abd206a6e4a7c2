import type winston from 'winston';
import {
  Container,
  IContainer,
  ContainerOptions,
  ServiceIdentifier,
  ServiceRegistry,
  CoreServices,
  SERVICE_IDENTIFIERS
} from './container';
import { AssembleRequest, AssemblerOptions, ConfigurationAssembler, ResolvedConfig } from '../conf/ConfigurationAssembler';
import { IConfigReader } from '../conf/JsonConfigReader';
import { ConfigTree } from '../conf/nodes';
import { ApplicationIdentity, createIdentity, resolveEnvironmentName } from './identity';
import { ContextInitializationError, DuplicateInitializationError } from './errors';
import { createContextLogger, log } from '../utils/logger';
import { toError } from '../utils/errors';

export enum ContextState {
  UNINITIALIZED = 'uninitialized',
  INITIALIZING = 'initializing',
  READY = 'ready',
  FAILED = 'failed',
  CLOSED = 'closed'
}

export interface ApplicationContextOptions {
  /** Falls back to the `app-id` attribute of the tree root, then `app`. */
  appId?: string;
  environmentName?: string;
  config: AssembleRequest;
  assembler?: ConfigurationAssembler;
  assemblerOptions?: AssemblerOptions;
  reader?: IConfigReader;
  container?: ContainerOptions;
  /** Registers the application's own services once core services are in place. */
  configure?: (container: IContainer, core: CoreServices) => void | Promise<void>;
  env?: NodeJS.ProcessEnv;
}

export type ContextReadyCallback = (context: ApplicationContext) => void | Promise<void>;

interface ContextHolder {
  state: ContextState;
  instance: ApplicationContext | null;
  pending: Promise<ApplicationContext> | null;
  failure: Error | null;
}

const holder: ContextHolder = {
  state: ContextState.UNINITIALIZED,
  instance: null,
  pending: null,
  failure: null
};

const readyCallbacks: ContextReadyCallback[] = [];

/**
 * The single per-process binding of resolved configuration, identity and
 * dependency container.
 *
 * Create it once at the entry point and pass it to the components that need
 * it; `ApplicationContext.current()` is for code that cannot have it passed
 * in. Concurrent `create` calls share one initialization, so the
 * configuration is assembled exactly once.
 */
export class ApplicationContext {
  private constructor(
    readonly identity: ApplicationIdentity,
    readonly config: ResolvedConfig,
    readonly tree: ConfigTree,
    readonly container: Container,
    readonly logger: winston.Logger
  ) {}

  get appId(): string {
    return this.identity.appId;
  }

  get instanceId(): string {
    return this.identity.instanceId;
  }

  get instanceTag(): string {
    return this.identity.instanceTag;
  }

  get environmentName(): string {
    return this.identity.environmentName;
  }

  static get state(): ContextState {
    return holder.state;
  }

  /**
   * The ready context, or null before it is ready, after it is closed and
   * after a failed initialization.
   */
  static current(): ApplicationContext | null {
    return holder.state === ContextState.READY ? holder.instance : null;
  }

  /**
   * Runs `callback` every time a context becomes ready. Registering the same
   * callback twice has no effect.
   */
  static onContextReady(callback: ContextReadyCallback): void {
    if (!readyCallbacks.includes(callback)) {
      readyCallbacks.push(callback);
    }
  }

  static async create(options: ApplicationContextOptions): Promise<ApplicationContext> {
    if (holder.state === ContextState.INITIALIZING && holder.pending) {
      log.debug('Application context is initializing, waiting for it');
      return holder.pending;
    }
    if (holder.state === ContextState.READY || holder.state === ContextState.CLOSED) {
      throw new DuplicateInitializationError(holder.state);
    }
    if (holder.state === ContextState.FAILED) {
      throw new ContextInitializationError(holder.failure);
    }

    holder.state = ContextState.INITIALIZING;
    holder.pending = ApplicationContext.initialize(options).then(
      async context => {
        holder.instance = context;
        holder.state = ContextState.READY;
        holder.pending = null;

        log.info('Application context ready', {
          app: context.appId,
          instance: context.instanceTag,
          environment: context.environmentName
        });

        await notifyReady(context);
        return context;
      },
      (error: unknown) => {
        holder.state = ContextState.FAILED;
        holder.failure = toError(error);
        holder.pending = null;
        log.error('Failed to initialize application context', {
          error: holder.failure.message
        });
        throw error;
      }
    );

    return holder.pending;
  }

  private static async initialize(options: ApplicationContextOptions): Promise<ApplicationContext> {
    const env = options.env ?? process.env;
    const environmentName = resolveEnvironmentName(options.environmentName, env);

    const assembler = options.assembler ?? new ConfigurationAssembler({ env, ...options.assemblerOptions });
    const config = await assembler.assemble(options.config);
    const tree = options.reader ? options.reader.read(config) : ConfigTree.empty();

    const identity = createIdentity(options.appId ?? tree.root.attr('app-id').asString(), environmentName);
    const logger = createContextLogger(identity);
    const core: CoreServices = { config, tree, logger, identity };

    const container = new Container(options.container);
    try {
      const registry = new ServiceRegistry(container).registerCoreServices(core);
      await options.configure?.(container, core);
      registry.requireRegistered(Object.values(SERVICE_IDENTIFIERS));
      registry.validate();
    } catch (error) {
      await container.close();
      throw error;
    }

    return new ApplicationContext(identity, config, tree, container, logger);
  }

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    return this.container.resolve(identifier);
  }

  resolveAsync<T>(identifier: ServiceIdentifier<T>): Promise<T> {
    return this.container.resolveAsync(identifier);
  }

  /**
   * Releases container-held services. The process keeps no current context
   * afterwards and cannot create another one.
   */
  async close(): Promise<void> {
    if (this.container.isClosed) {
      return;
    }

    await this.container.close();
    if (holder.instance === this) {
      holder.state = ContextState.CLOSED;
      holder.instance = null;
    }
    this.logger.info('Application context closed');
  }

  getStatus() {
    return {
      app: this.appId,
      instance: this.instanceTag,
      environment: this.environmentName,
      host: this.identity.hostName,
      state: holder.instance === this ? holder.state : ContextState.CLOSED,
      uptime: Date.now() - this.identity.startedAt.getTime(),
      includes: this.config.includes.length,
      services: this.container.getRegisteredServices().length
    };
  }
}

async function notifyReady(context: ApplicationContext): Promise<void> {
  for (const callback of readyCallbacks) {
    try {
      await callback(context);
    } catch (error) {
      log.warn('Context ready callback failed', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}

/**
 * Forgets the process-wide context and ready callbacks. Test-only: it does
 * not close a live context.
 */
export function resetApplicationContext(): void {
  holder.state = ContextState.UNINITIALIZED;
  holder.instance = null;
  holder.pending = null;
  holder.failure = null;
  readyCallbacks.length = 0;
}
