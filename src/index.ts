import { createApp } from './app.js';
import { config } from './config.js';
import { FleetService } from './services/fleetService.js';
import { logger } from './utils/logger.js';

function bootstrap(): void {
  const fleet = new FleetService();
  const app = createApp(fleet);

  app.listen(config.port, () => {
    logger.info(`API listening on port ${config.port}`);
  });
}

try {
  bootstrap();
} catch (err) {
  logger.fatal({ err }, 'Failed to bootstrap API');
  process.exit(1);
}
