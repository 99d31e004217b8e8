import { Request } from 'express';
import { z, ZodTypeAny } from 'zod';
import { ValidationError } from '../core/errors';

type RequestPart = 'body' | 'params' | 'query';

// Flatten zod issues into the ValidationError the error handler understands
export function toValidationError(error: z.ZodError, part: RequestPart): ValidationError {
  const fieldErrors = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    value: 'received' in err ? err.received : undefined,
  }));

  const [first] = fieldErrors;
  return new ValidationError(
    `Invalid request ${part}: ${fieldErrors.map(e => `${e.field || part}: ${e.message}`).join(', ')}`,
    first?.field || undefined,
    undefined,
    { fieldErrors }
  );
}

function parsePart<T extends ZodTypeAny>(schema: T, value: unknown, part: RequestPart): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw toValidationError(result.error, part);
  }
  return result.data;
}

export const parseBody = <T extends ZodTypeAny>(schema: T, req: Request): z.output<T> =>
  parsePart(schema, req.body, 'body');

export const parseParams = <T extends ZodTypeAny>(schema: T, req: Request): z.output<T> =>
  parsePart(schema, req.params, 'params');

export const parseQuery = <T extends ZodTypeAny>(schema: T, req: Request): z.output<T> =>
  parsePart(schema, req.query, 'query');
