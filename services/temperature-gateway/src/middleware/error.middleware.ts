/**
 * Error Handler Middleware
 */

import type { Request, Response, NextFunction } from 'express';
import { GatewayError, ErrorCodes } from '../../../../shared/types/conversion.types.js';
import { createLogger, type Logger } from '../../../../shared/utils/index.js';

export interface ErrorHandlerOptions {
  logger?: Logger;
  /** Hide messages of unexpected errors from clients */
  production?: boolean;
}

/**
 * Errors raised by express.json() while reading the body, e.g. malformed JSON
 */
function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return error instanceof Error
    && 'type' in error && typeof error.type === 'string'
    && 'status' in error && typeof error.status === 'number';
}

/**
 * Global error handler middleware
 */
export function createErrorHandler(options: ErrorHandlerOptions = {}) {
  const logger = options.logger ?? createLogger('temperature-gateway:error');

  // Express recognises error middleware by its four parameters
  return function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction) {
    logger.error('Request error', error, {
      method: req.method,
      path: req.path,
    });

    if (error instanceof GatewayError) {
      return res.status(error.statusCode).json({
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
        },
        timestamp: new Date().toISOString(),
        path: req.path,
      });
    }

    if (isBodyParserError(error) && error.status < 500) {
      return res.status(error.status).json({
        error: {
          code: ErrorCodes.INVALID_REQUEST,
          message: error.type === 'entity.parse.failed' ? 'Request body is not valid JSON' : error.message,
        },
        timestamp: new Date().toISOString(),
        path: req.path,
      });
    }

    const message = options.production || !(error instanceof Error)
      ? 'Internal server error'
      : error.message;

    res.status(500).json({
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message,
      },
      timestamp: new Date().toISOString(),
      path: req.path,
    });
  };
}

/**
 * Not found handler
 */
export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    error: {
      code: ErrorCodes.NOT_FOUND,
      message: `Endpoint not found: ${req.method} ${req.path}`,
    },
    timestamp: new Date().toISOString(),
    path: req.path,
  });
}
