/**
 * Trace Middleware
 *
 * Accepts the caller's `x-trace-id` (or generates one), echoes it on the
 * response and keeps it in `res.locals` for handlers and the error handler.
 */
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import logger from '../../utils/logger';

export const TRACE_HEADER = 'x-trace-id';

const TRACE_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export function traceMiddleware(req: Request, res: Response, next: NextFunction): void {
  const inbound = req.get(TRACE_HEADER);
  const traceId = inbound && TRACE_ID_PATTERN.test(inbound) ? inbound : uuidv4();

  res.locals.traceId = traceId;
  res.setHeader(TRACE_HEADER, traceId);

  logger.debug({ method: req.method, path: req.path, trace_id: traceId }, 'Incoming request');
  next();
}

/**
 * Request trace id stored by traceMiddleware.
 */
export function requestTraceId(res: Response): string | undefined {
  const value: unknown = res.locals.traceId;
  return typeof value === 'string' ? value : undefined;
}
