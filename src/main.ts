#!/usr/bin/env node
import { ApplicationBootstrap } from './core/ApplicationBootstrap';
import { settings } from './config';
import { log } from './utils/logger';
import { handleError, setupGlobalErrorHandling, toError } from './utils/errors';

/**
 * Main entry point: assembles the configuration for the current environment,
 * prints the resolved text and closes the context again.
 */
async function main(): Promise<void> {
  setupGlobalErrorHandling();

  log.info('Starting configuration bootstrap', {
    environment: settings.app.environment,
    nodeVersion: process.version
  });

  let bootstrap: ApplicationBootstrap;

  switch (settings.app.environment) {
    case 'production':
      bootstrap = ApplicationBootstrap.createProduction(settings);
      break;
    case 'test':
      bootstrap = ApplicationBootstrap.createTest(settings);
      break;
    case 'development':
      bootstrap = ApplicationBootstrap.createDevelopment(settings);
      break;
    default:
      bootstrap = new ApplicationBootstrap(settings);
      break;
  }

  const context = await bootstrap.bootstrap();
  log.info('Application context status', context.getStatus());

  process.stdout.write(context.config.text.endsWith('\n') ? context.config.text : `${context.config.text}\n`);
  await context.close();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    handleError(toError(error), 'main');
    process.exit(1);
  });
}
