import { getConfig } from './config/index.js';
import { createMonitorService } from './monitoring/index.js';
import { errorMessage } from './types/index.js';
import { createChildLogger } from './utils/logger.js';

const logger = createChildLogger('main');

async function main() {
  try {
    const config = getConfig();
    const service = createMonitorService(config);

    await service.load();
    service.start();

    const status = service.getStatus();
    logger.info(
      { tasks: status.tasks, driver: config.storage.driver, tickSeconds: config.monitor.tickSeconds },
      'Monitor started'
    );

    let stopping = false;
    const gracefulShutdown = async (signal: string) => {
      if (stopping) return;
      stopping = true;
      logger.info({ signal }, 'Received shutdown signal, stopping scheduler...');

      // Force exit if in-flight checks do not settle
      const forceExit = setTimeout(() => {
        logger.error('Graceful shutdown timed out, forcing exit');
        process.exit(1);
      }, 30000);

      try {
        await service.stop();
        logger.info('Monitor stopped');
        clearTimeout(forceExit);
        process.exit(0);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Error during shutdown');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => {
      void gracefulShutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
      void gracefulShutdown('SIGINT');
    });
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Failed to start monitor');
    process.exit(1);
  }
}

void main();
