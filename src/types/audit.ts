// =============================================================================
// PUBLISHING DESK — Audit Trail Types
// =============================================================================

/** Action codes written by the service */
export type AuditAction =
  // Identity
  | 'LOGIN'
  | 'LOGIN_FAILED'
  | 'LOGOUT'
  | 'REGISTER'
  | 'USER_CREATED'
  | 'USER_UPDATED'
  | 'USER_DEACTIVATED'
  | 'PASSWORD_RESET'
  // Categories
  | 'CREATE_CATEGORY'
  | 'UPDATE_CATEGORY'
  | 'DELETE_CATEGORY'
  // Content workflow
  | 'CREATE_CONTENT'
  | 'UPDATE_CONTENT'
  | 'DELETE_CONTENT'
  | 'SUBMIT_CONTENT'
  | 'VERIFY_CONTENT'
  | 'APPROVE_CONTENT'
  | 'REJECT_CONTENT'
  | 'PUBLISH_CONTENT'
  // Cooperation workflow
  | 'SUBMIT_COOP'
  | 'VERIFY_COOP'
  | 'APPROVE_COOP'
  // Access control
  | 'ACCESS_DENIED'
  // Row changes
  | 'INSERT'
  | 'UPDATE'
  | 'DELETE';

export type AuditDetails = Record<string, unknown>;

export interface AuditLogEntry {
  /** Monotonic, store-assigned; the only ordering consumers may rely on */
  id: number;
  action: string;
  userId: number | null;
  recordId: number | null;
  details: AuditDetails;
  createdAt: Date;
}

export interface NewAuditEntry {
  action: AuditAction;
  userId: number | null;
  recordId: number | null;
  details: AuditDetails;
}

export function toAuditView(entry: AuditLogEntry) {
  return {
    id: entry.id,
    action: entry.action,
    user_id: entry.userId,
    record_id: entry.recordId,
    details: entry.details,
    created_at: entry.createdAt.toISOString(),
  };
}
