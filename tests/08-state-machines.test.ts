// =============================================================================
// PUBLISHING DESK — Test Suite 08: Workflow State Machines
// =============================================================================

import {
  completedStages,
  CONTENT_TRANSITIONS,
  planContentTransition,
  REQUIRED_APPROVAL_STAGES,
} from '../src/workflow/content-machine';
import {
  COOPERATION_TRANSITIONS,
  planCooperationTransition,
} from '../src/workflow/cooperation-machine';
import { CONTENT_ACTIONS, CONTENT_STATUSES, ContentApprovalRecord } from '../src/types/content';
import { InvalidTransitionError } from '../src/types/errors';

type Stage = Pick<ContentApprovalRecord, 'action' | 'approverId'>;

const stage = (approverId: number, action: Stage['action'] = 'approve'): Stage => ({ action, approverId });

describe('Content state machine', () => {
  test('only the listed pairs are valid', () => {
    const valid: string[] = [];
    for (const status of CONTENT_STATUSES) {
      for (const action of CONTENT_ACTIONS) {
        const to = CONTENT_TRANSITIONS[status][action];
        if (to) valid.push(`${status}:${action}->${to}`);
      }
    }
    expect(valid).toEqual([
      'draft:submit->pending',
      'pending:approve->approved',
      'pending:reject->rejected',
      'approved:approve->approved',
      'approved:reject->rejected',
      'approved:publish->published',
    ]);
  });

  test('submit from draft', () => {
    expect(planContentTransition({ status: 'draft', action: 'submit', history: [], actorId: 1 })).toEqual({
      action: 'submit',
      from: 'draft',
      to: 'pending',
      auditAction: 'SUBMIT_CONTENT',
    });
  });

  test('first approval is stage 1 and records VERIFY_CONTENT', () => {
    const plan = planContentTransition({ status: 'pending', action: 'approve', history: [], actorId: 3 });
    expect(plan).toMatchObject({ to: 'approved', decision: 'approve', stage: 1, auditAction: 'VERIFY_CONTENT' });
  });

  test('second approval by another user is stage 2 and records APPROVE_CONTENT', () => {
    const plan = planContentTransition({
      status: 'approved',
      action: 'approve',
      history: [stage(3)],
      actorId: 4,
    });
    expect(plan).toMatchObject({ to: 'approved', stage: 2, auditAction: 'APPROVE_CONTENT' });
  });

  test('second approval by the same user is rejected', () => {
    expect(() =>
      planContentTransition({ status: 'approved', action: 'approve', history: [stage(3)], actorId: 3 }),
    ).toThrow('Second approval stage must come from a different approver');
  });

  test('a third approval is rejected', () => {
    expect(() =>
      planContentTransition({
        status: 'approved',
        action: 'approve',
        history: [stage(3), stage(4)],
        actorId: 1,
      }),
    ).toThrow('Content already has all approval stages');
  });

  test('publish needs every stage', () => {
    expect(REQUIRED_APPROVAL_STAGES).toBe(2);
    expect(() =>
      planContentTransition({ status: 'approved', action: 'publish', history: [stage(3)], actorId: 4 }),
    ).toThrow('Publishing requires 2 approval stages, 1 recorded');

    const plan = planContentTransition({
      status: 'approved',
      action: 'publish',
      history: [stage(3), stage(4)],
      actorId: 4,
    });
    expect(plan).toMatchObject({ to: 'published', auditAction: 'PUBLISH_CONTENT' });
    expect(plan.decision).toBeUndefined();
  });

  test('reject carries the decision without a stage', () => {
    const plan = planContentTransition({ status: 'approved', action: 'reject', history: [stage(3)], actorId: 4 });
    expect(plan).toEqual({
      action: 'reject',
      from: 'approved',
      to: 'rejected',
      decision: 'reject',
      auditAction: 'REJECT_CONTENT',
    });
  });

  test('invalid pairs throw InvalidTransitionError with the source state', () => {
    let caught: unknown;
    try {
      planContentTransition({ status: 'published', action: 'reject', history: [], actorId: 1 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidTransitionError);
    expect(caught).toMatchObject({ from: 'published', action: 'reject', status: 409 });
  });

  test('only approve records count as stages', () => {
    expect(completedStages([stage(3), stage(4, 'reject'), stage(5)])).toBe(2);
  });
});

describe('Cooperation state machine', () => {
  test('strictly sequential', () => {
    expect(COOPERATION_TRANSITIONS).toEqual({
      submitted: { verify: 'verified' },
      verified: { approve: 'approved' },
      approved: {},
    });
  });

  test('plans carry the audit action', () => {
    expect(planCooperationTransition('submitted', 'verify')).toEqual({
      from: 'submitted',
      to: 'verified',
      auditAction: 'VERIFY_COOP',
    });
    expect(planCooperationTransition('verified', 'approve')).toEqual({
      from: 'verified',
      to: 'approved',
      auditAction: 'APPROVE_COOP',
    });
  });

  test('approve before verify is invalid', () => {
    expect(() => planCooperationTransition('submitted', 'approve')).toThrow(InvalidTransitionError);
  });
});
