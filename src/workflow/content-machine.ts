// =============================================================================
// PUBLISHING DESK — Content State Machine
//
//   draft ──submit──▶ pending ──approve──▶ approved ──publish──▶ published
//                        │                  │  ▲
//                        │                  └──┘ approve (second stage)
//                        └──reject──▶ rejected ◀──reject── approved
//
// The status column only exposes the five states; how many approval
// stages are complete is read from the approval history, never from an
// extra status value. Publishing requires REQUIRED_APPROVAL_STAGES.
// =============================================================================

import {
  ApprovalDecision,
  ContentAction,
  ContentApprovalRecord,
  ContentStatus,
} from '../types/content';
import { AuditAction } from '../types/audit';
import { InvalidTransitionError } from '../types/errors';

export const REQUIRED_APPROVAL_STAGES = 2;

/** (state, action) → state. Anything absent is an invalid transition. */
export const CONTENT_TRANSITIONS: Readonly<
  Record<ContentStatus, Readonly<Partial<Record<ContentAction, ContentStatus>>>>
> = {
  draft: { submit: 'pending' },
  pending: { approve: 'approved', reject: 'rejected' },
  approved: { approve: 'approved', reject: 'rejected', publish: 'published' },
  rejected: {},
  published: {},
};

export interface ContentTransitionPlan {
  action: ContentAction;
  from: ContentStatus;
  to: ContentStatus;
  auditAction: AuditAction;
  /** History entry to append, for approve/reject */
  decision?: ApprovalDecision;
  /** 1-based approval stage this action completes */
  stage?: number;
}

type StageHistory = ReadonlyArray<Pick<ContentApprovalRecord, 'action' | 'approverId'>>;

export function completedStages(history: StageHistory): number {
  return history.filter((h) => h.action === 'approve').length;
}

/**
 * Decide what `action` does to a content item, or throw
 * InvalidTransitionError. Pure: callers apply the plan.
 */
export function planContentTransition(params: {
  status: ContentStatus;
  action: ContentAction;
  history: StageHistory;
  actorId: number;
}): ContentTransitionPlan {
  const { status: from, action, history, actorId } = params;
  const to = CONTENT_TRANSITIONS[from][action];

  if (!to) {
    throw new InvalidTransitionError(`Cannot ${action} content in status '${from}'`, from, action);
  }

  const stages = completedStages(history);

  switch (action) {
    case 'submit':
      return { action, from, to, auditAction: 'SUBMIT_CONTENT' };

    case 'approve': {
      if (stages >= REQUIRED_APPROVAL_STAGES) {
        throw new InvalidTransitionError('Content already has all approval stages', from, action);
      }
      const alreadyApproved = history.some((h) => h.action === 'approve' && h.approverId === actorId);
      if (alreadyApproved) {
        throw new InvalidTransitionError(
          'Second approval stage must come from a different approver',
          from,
          action,
        );
      }
      const stage = stages + 1;
      return {
        action,
        from,
        to,
        decision: 'approve',
        stage,
        auditAction: stage === 1 ? 'VERIFY_CONTENT' : 'APPROVE_CONTENT',
      };
    }

    case 'reject':
      return { action, from, to, decision: 'reject', auditAction: 'REJECT_CONTENT' };

    case 'publish':
      if (stages < REQUIRED_APPROVAL_STAGES) {
        throw new InvalidTransitionError(
          `Publishing requires ${REQUIRED_APPROVAL_STAGES} approval stages, ${stages} recorded`,
          from,
          action,
        );
      }
      return { action, from, to, auditAction: 'PUBLISH_CONTENT' };
  }
}
