// src/server.ts
import 'dotenv/config';
import { createServer } from 'http';

import { createApp } from './app';
import { loadConfig } from './config/appConfig';
import { createTasksService } from './services/tasksService';
import { logInfo, logError, errorMessage } from './utils/logger';

const config = loadConfig();
const tasks = createTasksService(config);
const app = createApp({ tasks, uploadDir: config.uploadDir });

const httpServer = createServer(app);

httpServer.listen(config.port, () => {
  logInfo('server', `Bulk order API listening on port ${config.port}`, {
    uploadDir: config.uploadDir,
    resultsDir: config.resultsDir,
    apiVersion: config.apiVersion,
    pacingMs: config.pacingMs
  });
});

// Running batches are not awaited: tasks live in memory and end with the process.
function shutdown(signal: string) {
  logInfo('server', `${signal} received. Shutting down...`);

  httpServer.close((err) => {
    if (err) {
      logError('server', 'Error during shutdown', { error: errorMessage(err) });
      process.exit(1);
    }
    logInfo('server', 'HTTP server closed.');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
