#!/usr/bin/env node
import { TariffApp } from './app';
import { DEFAULT_CONFIG_PATH, loadConfig } from './logic/config/config';
import { createConsoleLogger } from './logic/utils/logger';
import { extractErrorMessage } from './logic/utils/errorUtils';

async function main(): Promise<void> {
  const logger = createConsoleLogger('main');
  const configPath = process.env.TARIFF_CONFIG ?? DEFAULT_CONFIG_PATH;

  const config = await loadConfig(configPath);
  const app = new TariffApp({ config });

  const shutdown = (signal: string) => {
    logger.log(`Received ${signal}, shutting down`);
    app.stop();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('[UNHANDLED] Unhandled promise rejection:', extractErrorMessage(reason));
  });

  await app.start();
}

main().catch((error: unknown) => {
  console.error(`Failed to start: ${extractErrorMessage(error)}`);
  process.exitCode = 1;
});
