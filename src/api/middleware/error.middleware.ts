import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { logger } from '../../utils/logger.js';
import { ApiError } from '../../utils/errors.js';

/**
 * REST API Error Response Format
 */
export interface ErrorResponse {
  error: {
    message: string;
    field?: string;
  };
}

/**
 * Generic Error Handling Middleware
 *
 * This middleware ONLY knows about ApiError.
 * All library-specific errors should be converted to ApiError at their source.
 */
export function createErrorMiddleware(hideDetails: boolean): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response<ErrorResponse>, _next: NextFunction) => {
    // user facing errors
    if (error instanceof ApiError) {
      const context = { err: error, method: req.method, path: req.path };
      if (error.statusCode >= 500) {
        logger.error(context, 'Request error');
      } else {
        logger.warn(context, 'Request error');
      }

      res.status(error.statusCode).json({
        error: {
          message: error.message,
          field: error.field,
        },
      });
      return;
    }

    logger.error({ err: error, method: req.method, path: req.path }, 'Unhandled request error');

    // For any other error, return 500; production hides the details
    const message = hideDetails
      ? 'Internal server error'
      : error instanceof Error
        ? error.message
        : 'Unknown error';

    res.status(500).json({
      error: {
        message,
      },
    });
  };
}
