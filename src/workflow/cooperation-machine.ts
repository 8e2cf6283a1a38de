// =============================================================================
// PUBLISHING DESK — Cooperation Request State Machine
//
//   submitted ──verify──▶ verified ──approve──▶ approved
//
// Strictly sequential; there is no reject branch.
// =============================================================================

import { CooperationAction, CooperationStatus } from '../types/cooperation';
import { AuditAction } from '../types/audit';
import { Permission } from '../types/roles';
import { InvalidTransitionError } from '../types/errors';

export const COOPERATION_TRANSITIONS: Readonly<
  Record<CooperationStatus, Readonly<Partial<Record<CooperationAction, CooperationStatus>>>>
> = {
  submitted: { verify: 'verified' },
  verified: { approve: 'approved' },
  approved: {},
};

/** Permission and audit code for each action */
export const COOPERATION_ACTIONS: Readonly<
  Record<CooperationAction, { permission: Permission; auditAction: AuditAction }>
> = {
  verify: { permission: 'verify_coop', auditAction: 'VERIFY_COOP' },
  approve: { permission: 'approve_coop', auditAction: 'APPROVE_COOP' },
};

export function planCooperationTransition(
  from: CooperationStatus,
  action: CooperationAction,
): { from: CooperationStatus; to: CooperationStatus; auditAction: AuditAction } {
  const to = COOPERATION_TRANSITIONS[from][action];
  if (!to) {
    throw new InvalidTransitionError(`Cannot ${action} cooperation request in status '${from}'`, from, action);
  }
  return { from, to, auditAction: COOPERATION_ACTIONS[action].auditAction };
}
