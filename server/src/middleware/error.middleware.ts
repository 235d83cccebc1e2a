import type { Request, Response, NextFunction } from 'express';

/**
 * Last-resort handler: log with the request's traceId and answer 500 JSON.
 * Body-parser failures keep their 4xx status.
 */
export function errorMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = statusOf(err);
  if (status >= 500) {
    req.log.error({ err }, 'Unhandled error');
  } else {
    req.log.warn({ status, error: err instanceof Error ? err.message : String(err) }, 'Rejected request');
  }

  if (res.headersSent) {
    return;
  }
  res.status(status).json({
    error: status >= 500 ? 'Unexpected error' : 'Invalid request',
    traceId: req.traceId
  });
}

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err) {
    const { status } = err;
    if (typeof status === 'number' && status >= 400 && status < 600) return status;
  }
  return 500;
}
