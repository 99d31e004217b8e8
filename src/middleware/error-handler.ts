import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { logger } from '../core/logger';
import { ConflictError, DomainError, ErrorFactory, PersistenceFailureError, ValidationError } from '../core/errors';
import { toValidationError } from './validate';

// Seconds a client should wait before retrying a conflicting write
export const CONFLICT_RETRY_AFTER_SECONDS = 1;

const isJsonSyntaxError = (error: Error): boolean =>
  error instanceof SyntaxError && 'body' in error;

const sendDomainError = (error: DomainError, res: Response) => {
  if (error instanceof ConflictError) {
    res.set('Retry-After', String(CONFLICT_RETRY_AFTER_SECONDS));
  }
  return res.status(error.statusCode).json(ErrorFactory.createErrorResponse(error));
};

const handleGenericError = (res: Response) => {
  return res.status(500).json({
    success: false,
    error: {
      name: 'InternalServerError',
      message: 'Internal server error',
      code: 'INTERNAL_SERVER_ERROR',
      statusCode: 500,
      timestamp: new Date().toISOString(),
    },
  });
};

export const errorHandler = (error: Error, req: Request, res: Response, _next: NextFunction) => {
  const reqInfo = { id: req.id, method: req.method, url: req.originalUrl };

  if (isJsonSyntaxError(error)) {
    logger.warn({ req: reqInfo }, 'Malformed JSON body');
    return sendDomainError(new ValidationError('Malformed JSON body', 'body'), res);
  }

  if (error instanceof z.ZodError) {
    logger.warn({ req: reqInfo }, 'Request validation failed');
    return sendDomainError(toValidationError(error, 'body'), res);
  }

  if (error instanceof PersistenceFailureError) {
    logger.error({ req: reqInfo, operation: error.operation, error: error.failure }, 'Persistence failure');
    return sendDomainError(error, res);
  }

  if (error instanceof DomainError) {
    const level = error.statusCode >= 500 ? 'error' : 'warn';
    logger[level]({ req: reqInfo, code: error.code, message: error.message }, 'Request failed');
    return sendDomainError(error, res);
  }

  logger.error({ req: reqInfo, error }, 'Unhandled request error');
  return handleGenericError(res);
};
