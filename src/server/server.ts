import express from 'express';
import type { Server } from 'node:http';

import type { SearchDispatcher } from '../retrieval/dispatcher.js';
import { createLogger } from '../utils/logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRouter } from './routes/health.js';
import { createSearchRouter } from './routes/search.js';

const log = createLogger('server');

export interface AppDeps {
  dispatcher: SearchDispatcher;
}

export function createApp(deps: AppDeps) {
  const app = express();

  // API routes
  app.use('/api/search', createSearchRouter(deps.dispatcher));
  app.use('/api/health', createHealthRouter(deps.dispatcher));

  // Unknown API paths
  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  // API error handler (must come after API routes)
  app.use('/api', errorHandler);

  return app;
}

/**
 * Load the embedding model, then serve until SIGINT or SIGTERM.
 */
export async function startServer(deps: AppDeps, port: number): Promise<void> {
  await deps.dispatcher.init();
  const app = createApp(deps);

  return new Promise((resolve, reject) => {
    const server: Server = app.listen(port, () => {
      log.info(`Search API running at http://localhost:${port}`);

      const shutdown = () => {
        log.info('Shutting down search API...');
        server.close(() => {
          process.off('SIGINT', shutdown);
          process.off('SIGTERM', shutdown);
          resolve();
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        log.error(`Port ${port} is already in use. Try: chatstrata serve --port ${port + 1}`);
      }
      reject(err);
    });
  });
}
