import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

// Ids we are willing to echo into logs and audit entries
const REQUEST_ID_PATTERN = /^[\w.:-]{1,128}$/;

export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const supplied = req.get('x-request-id')?.trim();
  req.id = supplied && REQUEST_ID_PATTERN.test(supplied) ? supplied : uuidv4();
  res.setHeader('x-request-id', req.id);
  next();
};
