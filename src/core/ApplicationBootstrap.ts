import { ApplicationContext, ApplicationContextOptions } from './ApplicationContext';
import { ConfigEntry } from '../conf/ConfigurationAssembler';
import { JsonConfigReader } from '../conf/JsonConfigReader';
import { Settings, settings as defaultSettings } from '../config';
import { log, setLogLevel } from '../utils/logger';
import { toError } from '../utils/errors';

export interface BootstrapOptions {
  /** Install SIGINT/SIGTERM handlers that close the context. */
  handleSignals?: boolean;
  overrides?: Partial<ApplicationContextOptions>;
}

/**
 * Entry-point composition: turns settings into context options, creates the
 * process-wide context and wires graceful shutdown.
 */
export class ApplicationBootstrap {
  constructor(
    private readonly settings: Settings = defaultSettings,
    private readonly options: BootstrapOptions = {}
  ) {}

  /**
   * 配置和启动应用
   */
  async bootstrap(configure?: ApplicationContextOptions['configure']): Promise<ApplicationContext> {
    setLogLevel(this.settings.app.logLevel);
    log.info('Bootstrapping application', {
      environment: this.settings.app.environment,
      configRoot: this.settings.conf.root
    });

    const context = await ApplicationContext.create(this.buildContextOptions(configure));

    if (this.options.handleSignals ?? true) {
      this.setupProcessHandlers(context);
    }

    return context;
  }

  buildContextOptions(configure?: ApplicationContextOptions['configure']): ApplicationContextOptions {
    const environmentName = this.settings.app.environment;
    const entry: ConfigEntry = this.settings.conf.entry
      ? { kind: 'file', path: this.settings.conf.entry }
      : { kind: 'file', path: `app-${environmentName}.json`, optional: true };

    return {
      appId: this.settings.app.id,
      environmentName,
      config: {
        rootPath: this.settings.conf.root,
        entry,
        vars: { environment: environmentName }
      },
      assemblerOptions: {
        missingVariables: this.settings.conf.missingVariables,
        environmentScope: this.settings.conf.environmentScope
      },
      reader: new JsonConfigReader(),
      container: { duplicatePolicy: this.settings.container.duplicatePolicy },
      configure,
      ...this.options.overrides
    };
  }

  private setupProcessHandlers(context: ApplicationContext): void {
    const gracefulShutdown = async (signal: string): Promise<void> => {
      log.info(`Received ${signal}, closing application context`);
      try {
        await context.close();
        process.exit(0);
      } catch (error) {
        log.error('Error during graceful shutdown', { error: toError(error).message });
        process.exit(1);
      }
    };

    process.once('SIGINT', () => void gracefulShutdown('SIGINT'));
    process.once('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  }

  private static withEnvironment(environment: string, settings: Settings): ApplicationBootstrap {
    return new ApplicationBootstrap({ ...settings, app: { ...settings.app, environment } });
  }

  /**
   * 创建生产环境的应用启动器
   */
  static createProduction(settings: Settings = defaultSettings): ApplicationBootstrap {
    return ApplicationBootstrap.withEnvironment('production', settings);
  }

  /**
   * 创建开发环境的应用启动器
   */
  static createDevelopment(settings: Settings = defaultSettings): ApplicationBootstrap {
    return ApplicationBootstrap.withEnvironment('development', settings);
  }

  /**
   * 创建测试环境的应用启动器
   */
  static createTest(settings: Settings = defaultSettings): ApplicationBootstrap {
    return ApplicationBootstrap.withEnvironment('test', settings);
  }
}
