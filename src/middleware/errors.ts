import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { BlogError, ValidationError } from '../errors';

/**
 * Forwards a rejected handler promise to the error middleware (Express 4
 * does not do this on its own).
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Error handling middleware
 */
export function createErrorHandler(env: string) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof BlogError) {
      res.status(err.status).json({
        error: {
          message: err.message,
          status: err.status,
          ...(err instanceof ValidationError && Object.keys(err.details).length > 0 && { details: err.details }),
        },
      });
      return;
    }

    console.error(`❌ Unhandled error on ${req.method} ${req.originalUrl}:`, err);

    // body-parser reports malformed JSON with a 4xx `status`
    const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' && err.status < 500
      ? err.status
      : 500;
    const message = status === 500 ? 'Internal Server Error' : 'Bad Request';

    res.status(status).json({
      error: {
        message,
        status,
        ...(env === 'development' && err instanceof Error && { stack: err.stack }),
      },
    });
  };
}

/**
 * 404 handler middleware
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: 'Route not found',
      status: 404,
      path: req.path,
      method: req.method,
    },
  });
}
