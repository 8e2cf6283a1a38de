// =============================================================================
// PUBLISHING DESK — Cooperation Request Service
//
// Requests arrive with a base64 attachment. Only a reference to it is
// kept: name, mime type, byte size and the sha-256 of the decoded bytes.
// =============================================================================

import { createHash } from 'crypto';
import { AppContext } from '../context';
import { AuthenticatedUser } from '../types/auth';
import { CooperationAction, CooperationRecord } from '../types/cooperation';
import { ForbiddenError, NotFoundError, ValidationError } from '../types/errors';
import { planCooperationTransition } from '../workflow/cooperation-machine';
import { recordAuditEvent, recordRowChange } from './audit';

export interface CooperationSubmission {
  institutionName: string;
  contactName: string;
  email: string;
  phone: string | null;
  purpose: string;
  eventDate: string | null;
  document: {
    name: string;
    mime: string;
    base64: string;
  };
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/** Decode and fingerprint an attachment. */
export function fingerprintDocument(base64: string): { size: number; ref: string } {
  const compact = base64.replace(/\s+/g, '');
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new ValidationError('document_base64: must be non-empty base64');
  }
  const bytes = Buffer.from(compact, 'base64');
  return {
    size: bytes.length,
    ref: createHash('sha256').update(bytes).digest('hex'),
  };
}

function reviewer(ctx: AppContext, actor: AuthenticatedUser): boolean {
  return (
    ctx.evaluator.allowed(actor.roleId, 'verify_coop') ||
    ctx.evaluator.allowed(actor.roleId, 'approve_coop')
  );
}

export async function submitCooperation(
  ctx: AppContext,
  actor: AuthenticatedUser,
  submission: CooperationSubmission,
): Promise<CooperationRecord> {
  const { size, ref } = fingerprintDocument(submission.document.base64);

  return ctx.store.transaction(async (tx) => {
    const coop = await tx.cooperations.insert({
      requesterId: actor.id,
      institutionName: submission.institutionName,
      contactName: submission.contactName,
      email: submission.email,
      phone: submission.phone,
      purpose: submission.purpose,
      eventDate: submission.eventDate,
      documentName: submission.document.name,
      documentMime: submission.document.mime,
      documentSize: size,
      documentRef: ref,
    });

    await recordRowChange(tx, {
      kind: 'INSERT',
      table: 'cooperations',
      userId: actor.id,
      recordId: coop.id,
      newValues: { institution_name: coop.institutionName, status: coop.status, document_ref: ref },
    });
    await recordAuditEvent(tx, {
      action: 'SUBMIT_COOP',
      userId: actor.id,
      recordId: coop.id,
      details: { institution_name: coop.institutionName, document_ref: ref },
    });
    return coop;
  });
}

/** Requesters see their own requests; reviewers see all of them. */
export async function listCooperations(
  ctx: AppContext,
  actor: AuthenticatedUser,
): Promise<CooperationRecord[]> {
  return ctx.store.cooperations.list({
    requesterId: reviewer(ctx, actor) ? undefined : actor.id,
  });
}

export async function getCooperation(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
): Promise<CooperationRecord> {
  const coop = await ctx.store.cooperations.findById(id);
  if (!coop) {
    throw new NotFoundError('Cooperation request not found');
  }
  if (coop.requesterId !== actor.id && !reviewer(ctx, actor)) {
    throw new ForbiddenError('Not allowed to view this cooperation request', 'verify_coop', 'not_owner');
  }
  return coop;
}

/** verify: submitted → verified; approve: verified → approved. */
export async function transitionCooperation(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
  action: CooperationAction,
): Promise<CooperationRecord> {
  return ctx.store.transaction(async (tx) => {
    const coop = await tx.cooperations.findById(id, { forUpdate: true });
    if (!coop) {
      throw new NotFoundError('Cooperation request not found');
    }

    const plan = planCooperationTransition(coop.status, action);
    const updated = await tx.cooperations.updateStatus(id, plan.to, actor.id);

    await recordRowChange(tx, {
      kind: 'UPDATE',
      table: 'cooperations',
      userId: actor.id,
      recordId: id,
      oldValues: { status: plan.from },
      newValues: { status: plan.to },
    });
    await recordAuditEvent(tx, {
      action: plan.auditAction,
      userId: actor.id,
      recordId: id,
      details: { from: plan.from, to: plan.to, role: actor.roleName },
    });
    return updated;
  });
}
