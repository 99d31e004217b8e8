import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../core/errors';
import { ACTOR_ROLES, Actor, ActorRole, OperationContext, SYSTEM_ACTOR } from '../core/types';

const isActorRole = (value: string): value is ActorRole =>
  ACTOR_ROLES.some(role => role === value);

/**
 * Resolve the caller from the gateway headers. No headers means the system
 * actor; an id without a role is a customer.
 */
export function resolveActor(actorId: string | undefined, actorRole: string | undefined): Actor {
  const id = actorId?.trim() || null;
  const role = actorRole?.trim().toLowerCase();

  if (!role) {
    return id === null ? SYSTEM_ACTOR : { id, role: 'customer' };
  }
  if (!isActorRole(role)) {
    throw new ValidationError(`Unknown actor role: ${role}`, 'x-actor-role', role);
  }
  return { id, role };
}

export const requestContextMiddleware = (req: Request, res: Response, next: NextFunction) => {
  try {
    req.actor = resolveActor(req.get('x-actor-id'), req.get('x-actor-role'));
  } catch (error) {
    next(error);
    return;
  }

  // Client went away before we answered: roll back whatever is in flight
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  req.signal = controller.signal;

  req.auditContext = {
    requestId: req.id,
    method: req.method,
    path: req.originalUrl,
    ip: req.ip,
  };

  next();
};

// Operation context for service calls made on behalf of this request
export const operationContext = (req: Request): OperationContext => ({
  actor: req.actor,
  audit: req.auditContext,
  signal: req.signal,
});
