// =============================================================================
// PUBLISHING DESK — Category Service
// =============================================================================

import { AppContext } from '../context';
import { AuthenticatedUser } from '../types/auth';
import { CategoryFields, CategoryRecord } from '../types/category';
import { ConflictError, NotFoundError } from '../types/errors';
import { recordAuditEvent, recordRowChange } from './audit';

function snapshot(category: CategoryRecord): Record<string, unknown> {
  return {
    name: category.name,
    description: category.description,
    icon: category.icon,
    color: category.color,
  };
}

export async function listCategories(ctx: AppContext): Promise<CategoryRecord[]> {
  return ctx.store.categories.list();
}

export async function createCategory(
  ctx: AppContext,
  actor: AuthenticatedUser,
  fields: CategoryFields,
): Promise<CategoryRecord> {
  return ctx.store.transaction(async (tx) => {
    if (await tx.categories.findByName(fields.name)) {
      throw new ConflictError(`Category '${fields.name}' already exists`);
    }

    const category = await tx.categories.insert(fields, actor.id);

    await recordRowChange(tx, {
      kind: 'INSERT',
      table: 'content_categories',
      userId: actor.id,
      recordId: category.id,
      newValues: snapshot(category),
    });
    await recordAuditEvent(tx, {
      action: 'CREATE_CATEGORY',
      userId: actor.id,
      recordId: category.id,
      details: { name: category.name },
    });
    return category;
  });
}

export async function updateCategory(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
  fields: CategoryFields,
): Promise<CategoryRecord> {
  return ctx.store.transaction(async (tx) => {
    const existing = await tx.categories.findById(id, { forUpdate: true });
    if (!existing) {
      throw new NotFoundError('Category not found');
    }

    const clash = await tx.categories.findByName(fields.name);
    if (clash && clash.id !== id) {
      throw new ConflictError(`Category '${fields.name}' already exists`);
    }

    const updated = await tx.categories.update(id, fields);

    await recordRowChange(tx, {
      kind: 'UPDATE',
      table: 'content_categories',
      userId: actor.id,
      recordId: id,
      oldValues: snapshot(existing),
      newValues: snapshot(updated),
    });
    await recordAuditEvent(tx, {
      action: 'UPDATE_CATEGORY',
      userId: actor.id,
      recordId: id,
      details: { name: updated.name },
    });
    return updated;
  });
}

/** Categories that still file content cannot be deleted. */
export async function deleteCategory(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
): Promise<void> {
  await ctx.store.transaction(async (tx) => {
    const existing = await tx.categories.findById(id, { forUpdate: true });
    if (!existing) {
      throw new NotFoundError('Category not found');
    }

    const inUse = await tx.categories.countContents(id);
    if (inUse > 0) {
      throw new ConflictError(`Category is used by ${inUse} content item(s)`);
    }

    await tx.categories.delete(id);

    await recordRowChange(tx, {
      kind: 'DELETE',
      table: 'content_categories',
      userId: actor.id,
      recordId: id,
      oldValues: snapshot(existing),
    });
    await recordAuditEvent(tx, {
      action: 'DELETE_CATEGORY',
      userId: actor.id,
      recordId: id,
      details: { name: existing.name },
    });
  });
}
