import { Actor, AuditContext } from '../core/types';

// Filled in by the request-id, request-context and If-Match middleware
declare global {
  namespace Express {
    interface Request {
      id: string;
      actor: Actor;
      signal: AbortSignal;
      auditContext: AuditContext;
      ifMatchVersion?: number;
    }
  }
}

export {};
