/**
 * Error Handling Middleware
 */
import { Request, Response, NextFunction, RequestHandler } from 'express';
import logger from '../../utils/logger';
import { GovernorError } from '../../utils/errors';
import { requestTraceId } from './trace';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forward rejections of an async route handler to the error middleware.
 */
export function asyncHandler(handler: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function createErrorHandler(exposeInternalErrors: boolean) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const traceId = requestTraceId(res);

    if (err instanceof GovernorError) {
      const log = err.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
      log({ trace_id: traceId, path: req.path, code: err.code, error: err.message }, 'Request failed');
      res.status(err.statusCode).json({ error: err.toJSON(), trace_id: traceId });
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json({
        error: { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' },
        trace_id: traceId,
      });
      return;
    }

    const error = err instanceof Error ? err : new Error(String(err));
    logger.error({ trace_id: traceId, path: req.path, error: error.message, stack: error.stack }, 'Request error');
    res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: exposeInternalErrors ? error.message : 'Internal server error',
      },
      trace_id: traceId,
    });
  };
}
