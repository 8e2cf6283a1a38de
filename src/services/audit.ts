// =============================================================================
// PUBLISHING DESK — Audit Service
//
// Append-only audit trail. Entries are written through the caller's
// transaction so that a business mutation and its trail commit together:
// a reader who sees the new state also sees the entry, and a rolled-back
// mutation leaves no entry behind.
//
// Two kinds of entries:
//   action entries  — what the actor did (CREATE_CONTENT, VERIFY_COOP, ...)
//   row changes     — INSERT / UPDATE / DELETE with old and new values
// =============================================================================

import { AuditAction, AuditDetails, AuditLogEntry } from '../types/audit';
import { AuditRepository, Repositories } from '../types/store';

type RowChange = 'INSERT' | 'UPDATE' | 'DELETE';

interface AuditEvent {
  action: AuditAction;
  userId: number | null;
  recordId?: number | null;
  details?: AuditDetails;
}

/**
 * Record an action entry. `record_id` is mirrored into details so that
 * consumers can resolve the affected record without parsing the action.
 */
export async function recordAuditEvent(
  tx: Pick<Repositories, 'audit'>,
  event: AuditEvent,
): Promise<AuditLogEntry> {
  const recordId = event.recordId ?? null;
  return tx.audit.append({
    action: event.action,
    userId: event.userId,
    recordId,
    details: recordId === null ? { ...event.details } : { record_id: recordId, ...event.details },
  });
}

/** Record a row-level change to one of the workflow tables. */
export async function recordRowChange(
  tx: Pick<Repositories, 'audit'>,
  change: {
    kind: RowChange;
    table: string;
    userId: number;
    recordId: number;
    oldValues?: Record<string, unknown>;
    newValues?: Record<string, unknown>;
  },
): Promise<AuditLogEntry> {
  const details: AuditDetails = {
    table: change.table,
    record_id: change.recordId,
  };
  if (change.oldValues) details.old_values = change.oldValues;
  if (change.newValues) details.new_values = { record_id: change.recordId, ...change.newValues };

  return tx.audit.append({
    action: change.kind,
    userId: change.userId,
    recordId: change.recordId,
    details,
  });
}

/**
 * Entries appended after the given watermark, ascending by id.
 */
export async function listAuditLogAfter(
  audit: AuditRepository,
  watermark: number,
  limit: number,
): Promise<AuditLogEntry[]> {
  return audit.listAfter(watermark, limit);
}

/**
 * Resolve the affected record id of an entry: the record_id column first,
 * then details.record_id, then details.new_values.record_id.
 */
export function resolveRecordId(entry: Pick<AuditLogEntry, 'recordId' | 'details'>): number | null {
  if (entry.recordId !== null) return entry.recordId;

  const direct = entry.details.record_id;
  if (typeof direct === 'number') return direct;

  const newValues = entry.details.new_values;
  if (newValues && typeof newValues === 'object' && 'record_id' in newValues) {
    const nested = newValues.record_id;
    if (typeof nested === 'number') return nested;
  }
  return null;
}
