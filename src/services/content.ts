// =============================================================================
// PUBLISHING DESK — Content Workflow Service
//
// Applies the content state machine inside a storage transaction:
//   1. lock the content row (FOR UPDATE)
//   2. plan the transition against the locked status + approval history
//   3. append the approval record, update the status
//   4. append the row-change and action audit entries
// A rejected plan throws before anything is written, so an invalid
// transition leaves neither a mutation nor an audit entry.
//
// Permission checks (content.approve, content.publish) run in the route
// middleware; ownership checks run here because they need the row.
// =============================================================================

import { AppContext } from '../context';
import { AuthenticatedUser } from '../types/auth';
import {
  ContentAction,
  ContentApprovalRecord,
  ContentFields,
  ContentRecord,
  ContentStatus,
} from '../types/content';
import {
  ForbiddenError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
} from '../types/errors';
import { Repositories } from '../types/store';
import { planContentTransition } from '../workflow/content-machine';
import { recordAuditEvent, recordRowChange } from './audit';

export interface TransitionOutcome {
  content: ContentRecord;
  approval: ContentApprovalRecord | null;
}

function snapshot(content: ContentRecord): Record<string, unknown> {
  return {
    title: content.title,
    category_id: content.categoryId,
    author_id: content.authorId,
    status: content.status,
  };
}

function canView(ctx: AppContext, actor: AuthenticatedUser, content: ContentRecord): boolean {
  return content.authorId === actor.id || ctx.evaluator.allowed(actor.roleId, 'content.read_all');
}

async function loadForUpdate(tx: Repositories, id: number): Promise<ContentRecord> {
  const content = await tx.contents.findById(id, { forUpdate: true });
  if (!content) {
    throw new NotFoundError('Content not found');
  }
  return content;
}

async function requireCategory(tx: Repositories, categoryId: number): Promise<void> {
  if (!(await tx.categories.findById(categoryId))) {
    throw new ValidationError(`Unknown category_id ${categoryId}`);
  }
}

/** Editing and deleting are author-only and limited to drafts. */
function requireEditableDraft(actor: AuthenticatedUser, content: ContentRecord, operation: string): void {
  if (content.authorId !== actor.id) {
    throw new ForbiddenError(`Only the author can ${operation} this content`, undefined, 'not_owner');
  }
  if (content.status !== 'draft') {
    throw new InvalidTransitionError(
      `Cannot ${operation} content in status '${content.status}'`,
      content.status,
      operation,
    );
  }
}

// ── Create / read ──────────────────────────────────────────────────────

/**
 * Create a draft authored by `actor`. Requires content.create at the route.
 */
export async function createContent(
  ctx: AppContext,
  actor: AuthenticatedUser,
  fields: ContentFields,
): Promise<ContentRecord> {
  return ctx.store.transaction(async (tx) => {
    await requireCategory(tx, fields.categoryId);

    const content = await tx.contents.insert({ ...fields, authorId: actor.id });

    await recordRowChange(tx, {
      kind: 'INSERT',
      table: 'contents',
      userId: actor.id,
      recordId: content.id,
      newValues: snapshot(content),
    });
    await recordAuditEvent(tx, {
      action: 'CREATE_CONTENT',
      userId: actor.id,
      recordId: content.id,
      details: { title: content.title, category_id: content.categoryId, status: content.status },
    });
    return content;
  });
}

export async function getContent(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
): Promise<ContentRecord> {
  const content = await ctx.store.contents.findById(id);
  if (!content) {
    throw new NotFoundError('Content not found');
  }
  if (!canView(ctx, actor, content)) {
    throw new ForbiddenError('Not allowed to view this content', 'content.read_all', 'not_owner');
  }
  return content;
}

/** Authors see their own items; content.read_all sees everything. */
export async function listContents(
  ctx: AppContext,
  actor: AuthenticatedUser,
  filter: { status?: ContentStatus },
): Promise<ContentRecord[]> {
  const readAll = ctx.evaluator.allowed(actor.roleId, 'content.read_all');
  return ctx.store.contents.list({
    status: filter.status,
    authorId: readAll ? undefined : actor.id,
  });
}

export async function getContentHistory(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
): Promise<ContentApprovalRecord[]> {
  await getContent(ctx, actor, id);
  return ctx.store.approvals.listForContent(id);
}

// ── Draft editing ──────────────────────────────────────────────────────

export async function updateContent(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
  fields: ContentFields,
): Promise<ContentRecord> {
  return ctx.store.transaction(async (tx) => {
    const existing = await loadForUpdate(tx, id);
    requireEditableDraft(actor, existing, 'update');
    await requireCategory(tx, fields.categoryId);

    const updated = await tx.contents.updateFields(id, fields);

    await recordRowChange(tx, {
      kind: 'UPDATE',
      table: 'contents',
      userId: actor.id,
      recordId: id,
      oldValues: snapshot(existing),
      newValues: snapshot(updated),
    });
    await recordAuditEvent(tx, {
      action: 'UPDATE_CONTENT',
      userId: actor.id,
      recordId: id,
      details: { title: updated.title },
    });
    return updated;
  });
}

export async function deleteContent(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
): Promise<void> {
  await ctx.store.transaction(async (tx) => {
    const existing = await loadForUpdate(tx, id);
    requireEditableDraft(actor, existing, 'delete');

    await tx.contents.delete(id);

    await recordRowChange(tx, {
      kind: 'DELETE',
      table: 'contents',
      userId: actor.id,
      recordId: id,
      oldValues: snapshot(existing),
    });
    await recordAuditEvent(tx, {
      action: 'DELETE_CONTENT',
      userId: actor.id,
      recordId: id,
      details: { title: existing.title },
    });
  });
}

// ── Workflow transitions ───────────────────────────────────────────────

/**
 * Apply submit / approve / reject / publish to one content item.
 * Two concurrent calls on the same row serialize on the row lock; the
 * second is planned against the state the first left behind.
 */
export async function transitionContent(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
  action: ContentAction,
  notes: string | null,
): Promise<TransitionOutcome> {
  return ctx.store.transaction(async (tx) => {
    const content = await loadForUpdate(tx, id);

    if (action === 'submit' && content.authorId !== actor.id) {
      throw new ForbiddenError('Only the author can submit this content', undefined, 'not_owner');
    }

    const history = await tx.approvals.listForContent(id);
    const plan = planContentTransition({
      status: content.status,
      action,
      history,
      actorId: actor.id,
    });

    const approval = plan.decision
      ? await tx.approvals.insert({
          contentId: id,
          approverId: actor.id,
          approverRole: actor.roleName,
          action: plan.decision,
          notes,
        })
      : null;

    let updated = content;
    if (plan.to !== plan.from) {
      updated = await tx.contents.updateStatus(id, plan.to);
      await recordRowChange(tx, {
        kind: 'UPDATE',
        table: 'contents',
        userId: actor.id,
        recordId: id,
        oldValues: { status: plan.from },
        newValues: { status: plan.to },
      });
    }

    await recordAuditEvent(tx, {
      action: plan.auditAction,
      userId: actor.id,
      recordId: id,
      details: {
        from: plan.from,
        to: plan.to,
        notes,
        role: actor.roleName,
        ...(plan.stage !== undefined ? { stage: plan.stage } : {}),
        ...(approval ? { approval_id: approval.id } : {}),
      },
    });

    return { content: updated, approval };
  });
}
