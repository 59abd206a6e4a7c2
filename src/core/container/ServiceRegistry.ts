import type winston from 'winston';
import { Container, getIdentifierName } from './Container';
import { ServiceIdentifier } from './IContainer';
import { ContainerError } from './errors';
import { SERVICE_IDENTIFIERS } from './decorators';
import type { ResolvedConfig } from '../../conf/ConfigurationAssembler';
import type { ConfigTree } from '../../conf/nodes';
import type { ApplicationIdentity } from '../identity';
import { log } from '../../utils/logger';

export interface CoreServices {
  config: ResolvedConfig;
  tree: ConfigTree;
  logger: winston.Logger;
  identity: ApplicationIdentity;
}

/**
 * Populates a container at the composition boundary. Business code receives
 * its dependencies as constructor or factory arguments instead of reaching
 * into the registry.
 */
export class ServiceRegistry {
  constructor(private readonly container: Container) {}

  /**
   * 注册核心服务
   */
  registerCoreServices(core: CoreServices): this {
    this.container.registerInstance(SERVICE_IDENTIFIERS.CONFIG, core.config);
    this.container.registerInstance(SERVICE_IDENTIFIERS.CONFIG_TREE, core.tree);
    this.container.registerInstance(SERVICE_IDENTIFIERS.LOGGER, core.logger);
    this.container.registerInstance(SERVICE_IDENTIFIERS.APP_IDENTITY, core.identity);

    log.debug('Core services registered', {
      services: this.container.getRegisteredServices().map(getIdentifierName)
    });

    return this;
  }

  /**
   * 验证服务注册
   */
  requireRegistered(identifiers: ServiceIdentifier[]): void {
    const missing = identifiers.filter(id => !this.container.isRegistered(id)).map(getIdentifierName);
    if (missing.length > 0) {
      throw new ContainerError(`Missing required services: ${missing.join(', ')}`, 'MISSING_SERVICES');
    }
  }

  /**
   * 验证服务依赖
   */
  validate(): void {
    const validation = this.container.validate();
    if (!validation.valid) {
      throw new ContainerError(`Service validation failed: ${validation.errors.join(', ')}`, 'INVALID_REGISTRATIONS');
    }
  }
}
