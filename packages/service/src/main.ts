import { createLogger } from '@history-injector/core';
import { loadConfig } from './config.js';
import { startInjector, type RunningInjector } from './injector.js';

async function main(): Promise<void> {
  const config = await loadConfig();
  const logger = createLogger(config.logLevel);
  logger.info(
    {
      mqtt: `${config.mqttHost}:${config.mqttPort}`,
      topic: config.mqttTopic,
      database: config.databaseUrl ? 'postgresql' : config.databasePath,
      createMissingEntities: config.createMissingEntities,
      workerConcurrency: config.workerConcurrency,
    },
    'Starting history injector',
  );

  let injector: RunningInjector | null = null;
  const shutdown = async (exitCode: number): Promise<void> => {
    try {
      await injector?.stop();
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      exitCode = 1;
    }
    process.exit(exitCode);
  };

  injector = await startInjector(config, logger, {
    onFatal: (error) => {
      logger.fatal({ err: error }, 'Fatal error; stopping ingestion');
      void shutdown(1);
    },
  });

  process.on('SIGINT', () => void shutdown(0));
  process.on('SIGTERM', () => void shutdown(0));
}

main().catch((err: unknown) => {
  createLogger('info').fatal({ err }, 'Failed to start history injector');
  process.exit(1);
});
