/**
 * Request Context Middleware
 *
 * Tags each request with a request ID and, when the caller sends one, a
 * correlation ID. Both appear on every log line written while handling it.
 *
 * @module middleware/request-context
 */

import { Request, Response, NextFunction } from 'express';
import { generateRequestId, setRequestContext } from '../utils/logger';

export const requestContextMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const requestId = req.header('x-request-id') || generateRequestId();
  const correlationId = req.header('x-correlation-id');

  res.setHeader('x-request-id', requestId);
  if (correlationId) {
    res.setHeader('x-correlation-id', correlationId);
  }

  setRequestContext({
    requestId,
    method: req.method,
    path: req.path,
    ...(correlationId ? { correlationId } : {})
  });

  next();
};
