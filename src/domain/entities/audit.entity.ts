export interface AuditEvent {
  id: string;
  timestamp: Date;
  actor: string;
  action: AuditAction;
  resourceType: string;
  resourceId: string;
  details: Record<string, unknown>;
  createdAt: Date;
}

export interface CreateAuditEventInput {
  actor?: string;
  action: AuditAction;
  resourceType: string;
  resourceId: string;
  details?: Record<string, unknown>;
}

export type AuditAction =
  | 'apply.started'
  | 'apply.succeeded'
  | 'apply.failed'
  | 'apply.cancelled';
