/**
 * Server entry point.
 */

import { startServer } from './api/server.js';

const server = startServer();

const shutdown = (signal: string): void => {
  console.log(`[Server] ${signal} received, shutting down`);
  server.stop();
  process.exit(0);
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
