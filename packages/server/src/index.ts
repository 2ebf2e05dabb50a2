import { loadServerConfig } from './config/serverConfig.js';
import { MatchServer } from './server.js';
import { describeError, logger, setLogLevel } from './utils/logger.js';

const config = loadServerConfig();
setLogLevel(config.logLevel);

logger.info('Starting match server...', {
  moveTimeoutSeconds: config.moveTimeoutSeconds,
  bufferSize: config.bufferSize,
});

const server = new MatchServer(config);

server.start().catch((error: unknown) => {
  logger.error('Failed to start server', describeError(error));
  process.exit(1);
});

// Sessions in progress are not drained on shutdown
process.on('SIGTERM', () => {
  logger.info('SIGTERM received, shutting down...');
  server.close();
  process.exit(0);
});

process.on('SIGINT', () => {
  logger.info('SIGINT received, shutting down...');
  server.close();
  process.exit(0);
});
