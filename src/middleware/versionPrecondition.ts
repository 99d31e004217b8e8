import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../core/errors';
import { logger } from '../core/logger';

/**
 * Extract version from If-Match header
 */
export function extractVersionFromIfMatch(ifMatch: string | undefined): number | undefined {
  if (!ifMatch) {
    return undefined;
  }

  // Remove W/ prefix and quotes if present (ETag format: W/"version" or "version")
  const cleanVersion = ifMatch.trim().replace(/^W\//, '').replace(/"/g, '');
  const version = Number(cleanVersion);

  if (!Number.isInteger(version) || version < 1) {
    throw new ValidationError('Invalid If-Match header format', 'if-match', ifMatch);
  }

  return version;
}

/**
 * The If-Match header wins over a version sent in the body
 */
export function resolveExpectedVersion(ifMatchVersion?: number, bodyVersion?: number): number | undefined {
  return ifMatchVersion ?? bodyVersion;
}

export const formatEtag = (version: number): string => `"${version}"`;

/**
 * Middleware to handle If-Match header validation
 */
export function ifMatchMiddleware(req: Request, _res: Response, next: NextFunction) {
  try {
    req.ifMatchVersion = extractVersionFromIfMatch(req.get('if-match'));
    if (req.ifMatchVersion !== undefined) {
      logger.debug({ reqId: req.id, version: req.ifMatchVersion }, 'If-Match version extracted');
    }
    next();
  } catch (error) {
    logger.warn({ req: { id: req.id }, ifMatch: req.get('if-match') }, 'Invalid If-Match header');
    next(error);
  }
}
