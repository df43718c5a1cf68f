import { config } from './config.js';
import { createHubServer } from './app.js';
import { logger } from './lib/logger.js';

const { server, wss } = createHubServer();

server.listen(config.port, () => {
  logger.info({ port: config.port, wsPath: config.wsPath }, 'server_started');
});

process.on('SIGINT', () => {
  logger.info('shutting_down');
  for (const client of wss.clients) {
    client.close(1001, 'Server shutting down');
  }
  server.close(() => process.exit(0));
});
