import { Router } from 'express';
import type { SearchDispatcher } from '../../retrieval/dispatcher.js';
import { asyncHandler } from '../middleware/async-handler.js';

/**
 * GET /api/health — Embedding model and index reachability.
 */
export function createHealthRouter(dispatcher: SearchDispatcher): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.json(await dispatcher.health());
    }),
  );

  return router;
}
