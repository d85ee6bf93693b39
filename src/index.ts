/**
 * API Entry Point
 *
 * dotenv is loaded by ./config before anything reads the environment
 */

import http from 'http';
import { createApp } from './app';
import { validateConfig, PORT, NODE_ENV, DATABASE_PATH, TIME_ZONE, API_KEYS } from './config';
import { closeDatabase, initDatabase } from './db/sqlite';
import { logger } from './middleware/logging';

function startServer(): void {
  validateConfig();
  initDatabase(DATABASE_PATH);

  const app = createApp();
  const server = http.createServer(app);

  server.listen(PORT, () => {
    logger.info({
      event: 'server_started',
      url: `http://localhost:${PORT}`,
      environment: NODE_ENV,
      databasePath: DATABASE_PATH,
      timeZone: TIME_ZONE,
      authentication: API_KEYS.size > 0 ? 'api-keys' : 'disabled',
    }, 'Budget guard API listening');
  });

  // Close the database on termination
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ event: 'server_stopping', signal });
    server.close(() => {
      closeDatabase();
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  startServer();
} catch (error) {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
}
