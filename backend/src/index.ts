import dotenv from 'dotenv';
import { ConfigManager } from './services/configManager.js';
import { Logger } from './utils/logger.js';
import { createApplication } from './app.js';

dotenv.config();

async function main(): Promise<void> {
  const configManager = ConfigManager.fromEnvironment();
  const config = configManager.getConfig();
  const logger = new Logger(configManager, config.logDir);

  const app = await createApplication(configManager, logger);
  await app.server.start(config.port, config.host);
  logger.info(`Accepting up to ${config.maxConcurrentSessions} concurrent sessions; workspaces under ${config.workspaceRoot}`);

  const onSignal = (signal: NodeJS.Signals) => {
    if (app.shutdownCoordinator.isShuttingDown) {
      logger.warn(`Received ${signal} during shutdown, exiting immediately`);
      process.exit(1);
    }
    logger.info(`Received ${signal}, shutting down`);
    app.shutdown(signal)
      .then(async (report) => {
        await logger.close();
        process.exit(report.exitCode);
      })
      .catch((error) => {
        logger.error('Shutdown failed', error instanceof Error ? error : undefined);
        process.exit(1);
      });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((error) => {
  console.error('Failed to initialize server:', error instanceof Error ? error.message : error);
  process.exit(1);
});
