/**
 * Express error middleware for the search API.
 *
 * Coded errors answer with their own status and code; anything else is a 500.
 * Request errors are logged at warn, everything else at error.
 */

import type { Request, Response, NextFunction } from 'express';
import { StrataError, isUserError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('server');

export interface ErrorBody {
  error: string;
  code: string;
}

/** Status set by body-parser and other express middleware. */
function middlewareStatus(err: Error): number | undefined {
  const status: unknown = 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : undefined;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof StrataError) {
    if (isUserError(err)) {
      log.warn(err.message, { code: err.code });
    } else {
      log.error(err.toDetailedString());
    }
    const body: ErrorBody = { error: err.message, code: err.code };
    res.status(err.status).json(body);
    return;
  }

  const status = middlewareStatus(err) ?? 500;
  if (status >= 500) {
    log.error(err.message);
  } else {
    log.warn(err.message);
  }
  const body: ErrorBody = {
    error: status >= 500 ? 'Internal server error' : err.message,
    code: status >= 500 ? 'INTERNAL' : 'BAD_REQUEST',
  };
  res.status(status).json(body);
}
