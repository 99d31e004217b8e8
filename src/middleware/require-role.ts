import { Request, Response, NextFunction } from 'express';
import { ForbiddenError } from '../core/errors';
import { isPrivileged } from '../core/types';

// Only admin and super_admin callers get past this
export const requirePrivileged = (operation: string) =>
  (req: Request, _res: Response, next: NextFunction) => {
    if (!isPrivileged(req.actor)) {
      next(ForbiddenError.privilegedOnly(operation));
      return;
    }
    next();
  };
