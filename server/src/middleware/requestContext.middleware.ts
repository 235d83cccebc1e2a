/**
 * Request Context Middleware
 *
 * Ensures every request has a traceId:
 * - Reuses x-trace-id from client if provided
 * - Generates UUID if not provided
 * - Attaches req.traceId and req.log (child logger with traceId)
 * - Returns x-trace-id in response header
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger, type Logger } from '../lib/logger/structured-logger.js';

declare global {
  namespace Express {
    interface Request {
      traceId: string;
      log: Logger;
    }
  }
}

const MAX_TRACE_ID_LENGTH = 128;

export function requestContextMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const header = req.header('x-trace-id');
  const traceId = header && header.length <= MAX_TRACE_ID_LENGTH ? header : uuidv4();

  req.traceId = traceId;
  req.log = logger.child({ traceId });
  res.setHeader('x-trace-id', traceId);

  next();
}
