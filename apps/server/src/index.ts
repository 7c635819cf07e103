import 'dotenv/config';
import { initTelemetry } from './observability/telemetry.js';
import { logger } from './observability/logger.js';
import { loadServerConfig } from './config.js';
import { RaceCoordinator } from './race/RaceCoordinator.js';
import { createAppServer } from './server.js';
import { WebSocketGateway } from './ws/Gateway.js';

initTelemetry();

const config = loadServerConfig();
for (const warning of config.warnings) {
  logger.warn('config fallback', { context: { warning } });
}

const coordinator = new RaceCoordinator({ maze: config.maze });
const server = createAppServer({ context: { coordinator } });
const gateway = new WebSocketGateway(server, { coordinator });

server.listen(config.port, config.host, () => {
  logger.info('server listening', {
    context: {
      host: config.host,
      port: config.port,
      maze: coordinator.getMazeInfo(),
    },
  });
});

function shutdown(signal: NodeJS.Signals) {
  logger.info('shutting down', { context: { signal } });
  gateway.shutdown();
  server.close((error) => {
    if (error) {
      logger.error('server close failed', { error });
      process.exitCode = 1;
    }
    process.exit();
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
