// =============================================================================
// PUBLISHING DESK — PostgreSQL Store
//
// All SQL lives here, behind the Store interface. Transactions run on a
// dedicated pooled client: BEGIN, the caller's work, COMMIT, or ROLLBACK
// on any error.
//
// Audit ordering: before its first audit insert a transaction takes
// pg_advisory_xact_lock(AUDIT_LOCK_KEY). Audited transactions therefore
// commit one at a time, and audit ids become visible in the order they
// were assigned, so a reader paging with `id > watermark` never skips one.
// =============================================================================

import { QueryResult, QueryResultRow } from 'pg';
import { PgPool } from './pool';
import { Logger } from '../observability/logger';
import { AuditLogEntry, AuditDetails } from '../types/audit';
import { CategoryRecord } from '../types/category';
import { ContentApprovalRecord, ContentRecord, ContentStatus, ApprovalDecision } from '../types/content';
import { CooperationRecord, CooperationStatus } from '../types/cooperation';
import { ConflictError } from '../types/errors';
import { Repositories, Store } from '../types/store';
import { SessionRecord, UserRecord } from '../types/user';

/** Key for the transaction-scoped lock serializing audit appends */
export const AUDIT_LOCK_KEY = 7_210_001;

interface Sql {
  <R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

// ── Row shapes ─────────────────────────────────────────────────────────

type UserRow = {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  full_name: string;
  role_id: number;
  role_name: string;
  is_active: boolean;
  created_at: Date;
};

type SessionRow = {
  id: string;
  user_id: number;
  token_id: string;
  created_at: Date;
  terminated_at: Date | null;
};

type CategoryRow = {
  id: number;
  name: string;
  description: string | null;
  icon: string | null;
  color: string | null;
  created_by: number;
  created_at: Date;
  updated_at: Date;
};

type ContentRow = {
  id: number;
  author_id: number;
  category_id: number;
  title: string;
  body: string;
  excerpt: string | null;
  status: ContentStatus;
  created_at: Date;
  updated_at: Date;
  published_at: Date | null;
};

type ApprovalRow = {
  id: number;
  content_id: number;
  approver_id: number;
  approver_name: string;
  approver_role: string;
  action: ApprovalDecision;
  notes: string | null;
  created_at: Date;
};

type CooperationRow = {
  id: number;
  requester_id: number;
  institution_name: string;
  contact_name: string;
  email: string;
  phone: string | null;
  purpose: string;
  event_date: string | null;
  document_name: string;
  document_mime: string;
  document_size: number;
  document_ref: string;
  status: CooperationStatus;
  verified_by: number | null;
  verified_at: Date | null;
  approved_by: number | null;
  approved_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

type AuditRow = {
  /** BIGSERIAL arrives as a string */
  id: string;
  action: string;
  user_id: number | null;
  record_id: number | null;
  details: AuditDetails;
  created_at: Date;
};

// ── Mapping ────────────────────────────────────────────────────────────

const USER_COLUMNS = `u.id, u.username, u.email, u.password_hash, u.full_name,
  u.role_id, r.name AS role_name, u.is_active, u.created_at`;

const COOPERATION_COLUMNS = `id, requester_id, institution_name, contact_name, email, phone,
  purpose, to_char(event_date, 'YYYY-MM-DD') AS event_date, document_name, document_mime,
  document_size, document_ref, status, verified_by, verified_at, approved_by, approved_at,
  created_at, updated_at`;

function toUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    fullName: row.full_name,
    roleId: row.role_id,
    roleName: row.role_name,
    isActive: row.is_active,
    createdAt: row.created_at,
  };
}

function toCategory(row: CategoryRow): CategoryRecord {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    icon: row.icon,
    color: row.color,
    createdBy: row.created_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toContent(row: ContentRow): ContentRecord {
  return {
    id: row.id,
    authorId: row.author_id,
    categoryId: row.category_id,
    title: row.title,
    body: row.body,
    excerpt: row.excerpt,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    publishedAt: row.published_at,
  };
}

function toApproval(row: ApprovalRow): ContentApprovalRecord {
  return {
    id: row.id,
    contentId: row.content_id,
    approverId: row.approver_id,
    approverName: row.approver_name,
    approverRole: row.approver_role,
    action: row.action,
    notes: row.notes,
    createdAt: row.created_at,
  };
}

function toCooperation(row: CooperationRow): CooperationRecord {
  return {
    id: row.id,
    requesterId: row.requester_id,
    institutionName: row.institution_name,
    contactName: row.contact_name,
    email: row.email,
    phone: row.phone,
    purpose: row.purpose,
    eventDate: row.event_date,
    documentName: row.document_name,
    documentMime: row.document_mime,
    documentSize: row.document_size,
    documentRef: row.document_ref,
    status: row.status,
    verifiedBy: row.verified_by,
    verifiedAt: row.verified_at,
    approvedBy: row.approved_by,
    approvedAt: row.approved_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toAuditEntry(row: AuditRow): AuditLogEntry {
  return {
    id: Number(row.id),
    action: row.action,
    userId: row.user_id,
    recordId: row.record_id,
    details: row.details,
    createdAt: row.created_at,
  };
}

function firstRow<R extends QueryResultRow>(result: QueryResult<R>, what: string): R {
  const row = result.rows[0];
  if (!row) {
    throw new Error(`${what}: no row returned`);
  }
  return row;
}

/** ILIKE treats % and _ as wildcards; backslash is the default escape */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** Unique violations surface as ConflictError; everything else propagates. */
function mapUniqueViolation(err: unknown): never {
  if (err instanceof Error && 'code' in err && err.code === '23505') {
    const detail = 'detail' in err && typeof err.detail === 'string' ? err.detail : 'Duplicate value';
    throw new ConflictError(detail);
  }
  throw err;
}

// ── Repositories over one connection ───────────────────────────────────

function createRepositories(sql: Sql, beforeAuditAppend: () => Promise<void>): Repositories {
  return {
    roles: {
      async list() {
        const result = await sql<{ id: number; name: string }>('SELECT id, name FROM roles ORDER BY id');
        return result.rows;
      },
      async findById(id) {
        const result = await sql<{ id: number; name: string }>('SELECT id, name FROM roles WHERE id = $1', [id]);
        return result.rows[0] ?? null;
      },
      async findByName(name) {
        const result = await sql<{ id: number; name: string }>('SELECT id, name FROM roles WHERE name = $1', [name]);
        return result.rows[0] ?? null;
      },
      async listGrants() {
        const result = await sql<{ role_id: number; permission: string }>(
          `SELECT rp.role_id, p.name AS permission
           FROM role_permissions rp
           JOIN permissions p ON p.id = rp.permission_id`,
        );
        return result.rows.map((row) => ({ roleId: row.role_id, permission: row.permission }));
      },
    },

    users: {
      async findById(id, opts) {
        const lock = opts?.forUpdate ? ' FOR UPDATE OF u' : '';
        const result = await sql<UserRow>(
          `SELECT ${USER_COLUMNS} FROM users u JOIN roles r ON r.id = u.role_id WHERE u.id = $1${lock}`,
          [id],
        );
        return result.rows[0] ? toUser(result.rows[0]) : null;
      },
      async findByEmail(email) {
        const result = await sql<UserRow>(
          `SELECT ${USER_COLUMNS} FROM users u JOIN roles r ON r.id = u.role_id WHERE u.email = $1`,
          [email],
        );
        return result.rows[0] ? toUser(result.rows[0]) : null;
      },
      async findByUsername(username) {
        const result = await sql<UserRow>(
          `SELECT ${USER_COLUMNS} FROM users u JOIN roles r ON r.id = u.role_id WHERE u.username = $1`,
          [username],
        );
        return result.rows[0] ? toUser(result.rows[0]) : null;
      },
      async identityTaken(username, email) {
        const result = await sql<{ taken: boolean }>(
          'SELECT EXISTS (SELECT 1 FROM users WHERE username = $1 OR email = $2) AS taken',
          [username, email],
        );
        return result.rows[0]?.taken ?? false;
      },
      async insert(user) {
        const inserted = await sql<{ id: number }>(
          `INSERT INTO users (username, email, password_hash, full_name, role_id)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING id`,
          [user.username, user.email, user.passwordHash, user.fullName, user.roleId],
        ).catch(mapUniqueViolation);
        const { id } = firstRow(inserted, 'users.insert');
        const result = await sql<UserRow>(
          `SELECT ${USER_COLUMNS} FROM users u JOIN roles r ON r.id = u.role_id WHERE u.id = $1`,
          [id],
        );
        return toUser(firstRow(result, 'users.insert'));
      },
      async update(id, fields) {
        const result = await sql<UserRow>(
          `WITH u AS (
             UPDATE users
             SET full_name = $2, email = $3, is_active = $4, updated_at = now()
             WHERE id = $1
             RETURNING *
           )
           SELECT ${USER_COLUMNS} FROM u JOIN roles r ON r.id = u.role_id`,
          [id, fields.fullName, fields.email, fields.isActive],
        ).catch(mapUniqueViolation);
        return toUser(firstRow(result, 'users.update'));
      },
      async setPassword(id, passwordHash) {
        await sql('UPDATE users SET password_hash = $2, updated_at = now() WHERE id = $1', [id, passwordHash]);
      },
      async list(filter) {
        const conditions: string[] = [];
        const params: unknown[] = [];
        if (filter.roleId !== undefined) {
          params.push(filter.roleId);
          conditions.push(`u.role_id = $${params.length}`);
        }
        if (filter.isActive !== undefined) {
          params.push(filter.isActive);
          conditions.push(`u.is_active = $${params.length}`);
        }
        if (filter.search) {
          params.push(`%${escapeLike(filter.search)}%`);
          const p = `$${params.length}`;
          conditions.push(`(u.username ILIKE ${p} OR u.full_name ILIKE ${p} OR u.email ILIKE ${p})`);
        }
        const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
        params.push(filter.limit, filter.offset);

        const result = await sql<UserRow>(
          `SELECT ${USER_COLUMNS} FROM users u JOIN roles r ON r.id = u.role_id
           ${where}
           ORDER BY u.id
           LIMIT $${params.length - 1} OFFSET $${params.length}`,
          params,
        );
        return result.rows.map(toUser);
      },
    },

    sessions: {
      async insert(session) {
        await sql(
          `INSERT INTO sessions (id, user_id, token_id, ip_address, user_agent)
           VALUES ($1, $2, $3, $4, $5)`,
          [session.id, session.userId, session.tokenId, session.ipAddress, session.userAgent],
        );
      },
      async findActive(tokenId): Promise<SessionRecord | null> {
        const result = await sql<SessionRow>(
          `SELECT id, user_id, token_id, created_at, terminated_at
           FROM sessions WHERE token_id = $1 AND terminated_at IS NULL`,
          [tokenId],
        );
        const row = result.rows[0];
        return row
          ? {
              id: row.id,
              userId: row.user_id,
              tokenId: row.token_id,
              createdAt: row.created_at,
              terminatedAt: row.terminated_at,
            }
          : null;
      },
      async terminate(tokenId) {
        const result = await sql(
          'UPDATE sessions SET terminated_at = now() WHERE token_id = $1 AND terminated_at IS NULL',
          [tokenId],
        );
        return (result.rowCount ?? 0) > 0;
      },
      async terminateAllForUser(userId) {
        const result = await sql(
          'UPDATE sessions SET terminated_at = now() WHERE user_id = $1 AND terminated_at IS NULL',
          [userId],
        );
        return result.rowCount ?? 0;
      },
    },

    categories: {
      async list() {
        const result = await sql<CategoryRow>('SELECT * FROM content_categories ORDER BY name');
        return result.rows.map(toCategory);
      },
      async findById(id, opts) {
        const lock = opts?.forUpdate ? ' FOR UPDATE' : '';
        const result = await sql<CategoryRow>(`SELECT * FROM content_categories WHERE id = $1${lock}`, [id]);
        return result.rows[0] ? toCategory(result.rows[0]) : null;
      },
      async findByName(name) {
        const result = await sql<CategoryRow>('SELECT * FROM content_categories WHERE name = $1', [name]);
        return result.rows[0] ? toCategory(result.rows[0]) : null;
      },
      async insert(fields, createdBy) {
        const result = await sql<CategoryRow>(
          `INSERT INTO content_categories (name, description, icon, color, created_by)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING *`,
          [fields.name, fields.description, fields.icon, fields.color, createdBy],
        ).catch(mapUniqueViolation);
        return toCategory(firstRow(result, 'categories.insert'));
      },
      async update(id, fields) {
        const result = await sql<CategoryRow>(
          `UPDATE content_categories
           SET name = $2, description = $3, icon = $4, color = $5, updated_at = now()
           WHERE id = $1
           RETURNING *`,
          [id, fields.name, fields.description, fields.icon, fields.color],
        ).catch(mapUniqueViolation);
        return toCategory(firstRow(result, 'categories.update'));
      },
      async delete(id) {
        await sql('DELETE FROM content_categories WHERE id = $1', [id]);
      },
      async countContents(id) {
        const result = await sql<{ count: string }>(
          'SELECT count(*) AS count FROM contents WHERE category_id = $1',
          [id],
        );
        return Number(result.rows[0]?.count ?? 0);
      },
    },

    contents: {
      async findById(id, opts) {
        const lock = opts?.forUpdate ? ' FOR UPDATE' : '';
        const result = await sql<ContentRow>(`SELECT * FROM contents WHERE id = $1${lock}`, [id]);
        return result.rows[0] ? toContent(result.rows[0]) : null;
      },
      async list(filter) {
        const conditions: string[] = [];
        const params: unknown[] = [];
        if (filter.authorId !== undefined) {
          params.push(filter.authorId);
          conditions.push(`author_id = $${params.length}`);
        }
        if (filter.status) {
          params.push(filter.status);
          conditions.push(`status = $${params.length}`);
        }
        const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
        const result = await sql<ContentRow>(`SELECT * FROM contents ${where} ORDER BY id DESC`, params);
        return result.rows.map(toContent);
      },
      async insert(content) {
        const result = await sql<ContentRow>(
          `INSERT INTO contents (author_id, category_id, title, body, excerpt)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING *`,
          [content.authorId, content.categoryId, content.title, content.body, content.excerpt],
        );
        return toContent(firstRow(result, 'contents.insert'));
      },
      async updateFields(id, fields) {
        const result = await sql<ContentRow>(
          `UPDATE contents
           SET category_id = $2, title = $3, body = $4, excerpt = $5, updated_at = now()
           WHERE id = $1
           RETURNING *`,
          [id, fields.categoryId, fields.title, fields.body, fields.excerpt],
        );
        return toContent(firstRow(result, 'contents.updateFields'));
      },
      async updateStatus(id, status) {
        const result = await sql<ContentRow>(
          `UPDATE contents
           SET status = $2,
               updated_at = now(),
               published_at = CASE WHEN $2 = 'published' THEN now() ELSE published_at END
           WHERE id = $1
           RETURNING *`,
          [id, status],
        );
        return toContent(firstRow(result, 'contents.updateStatus'));
      },
      async delete(id) {
        await sql('DELETE FROM contents WHERE id = $1', [id]);
      },
    },

    approvals: {
      async listForContent(contentId) {
        const result = await sql<ApprovalRow>(
          `SELECT a.id, a.content_id, a.approver_id, u.full_name AS approver_name,
                  a.approver_role, a.action, a.notes, a.created_at
           FROM content_approvals a
           JOIN users u ON u.id = a.approver_id
           WHERE a.content_id = $1
           ORDER BY a.id`,
          [contentId],
        );
        return result.rows.map(toApproval);
      },
      async insert(record) {
        const result = await sql<ApprovalRow>(
          `WITH inserted AS (
             INSERT INTO content_approvals (content_id, approver_id, approver_role, action, notes)
             VALUES ($1, $2, $3, $4, $5)
             RETURNING *
           )
           SELECT i.id, i.content_id, i.approver_id, u.full_name AS approver_name,
                  i.approver_role, i.action, i.notes, i.created_at
           FROM inserted i
           JOIN users u ON u.id = i.approver_id`,
          [record.contentId, record.approverId, record.approverRole, record.action, record.notes],
        );
        return toApproval(firstRow(result, 'approvals.insert'));
      },
    },

    cooperations: {
      async findById(id, opts) {
        const lock = opts?.forUpdate ? ' FOR UPDATE' : '';
        const result = await sql<CooperationRow>(
          `SELECT ${COOPERATION_COLUMNS} FROM cooperations WHERE id = $1${lock}`,
          [id],
        );
        return result.rows[0] ? toCooperation(result.rows[0]) : null;
      },
      async list(filter) {
        const result =
          filter.requesterId !== undefined
            ? await sql<CooperationRow>(
                `SELECT ${COOPERATION_COLUMNS} FROM cooperations WHERE requester_id = $1 ORDER BY id DESC`,
                [filter.requesterId],
              )
            : await sql<CooperationRow>(`SELECT ${COOPERATION_COLUMNS} FROM cooperations ORDER BY id DESC`);
        return result.rows.map(toCooperation);
      },
      async insert(coop) {
        const result = await sql<CooperationRow>(
          `INSERT INTO cooperations (requester_id, institution_name, contact_name, email, phone,
             purpose, event_date, document_name, document_mime, document_size, document_ref)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
           RETURNING ${COOPERATION_COLUMNS}`,
          [
            coop.requesterId,
            coop.institutionName,
            coop.contactName,
            coop.email,
            coop.phone,
            coop.purpose,
            coop.eventDate,
            coop.documentName,
            coop.documentMime,
            coop.documentSize,
            coop.documentRef,
          ],
        );
        return toCooperation(firstRow(result, 'cooperations.insert'));
      },
      async updateStatus(id, status, actorId) {
        const stamp =
          status === 'verified'
            ? 'verified_by = $3, verified_at = now(),'
            : status === 'approved'
              ? 'approved_by = $3, approved_at = now(),'
              : '';
        const result = await sql<CooperationRow>(
          `UPDATE cooperations
           SET status = $2, ${stamp} updated_at = now()
           WHERE id = $1
           RETURNING ${COOPERATION_COLUMNS}`,
          stamp ? [id, status, actorId] : [id, status],
        );
        return toCooperation(firstRow(result, 'cooperations.updateStatus'));
      },
    },

    audit: {
      async append(entry) {
        await beforeAuditAppend();
        const result = await sql<AuditRow>(
          `INSERT INTO audit_logs (action, user_id, record_id, details)
           VALUES ($1, $2, $3, $4)
           RETURNING id, action, user_id, record_id, details, created_at`,
          [entry.action, entry.userId, entry.recordId, JSON.stringify(entry.details)],
        );
        return toAuditEntry(firstRow(result, 'audit.append'));
      },
      async listAfter(afterId, limit) {
        const result = await sql<AuditRow>(
          `SELECT id, action, user_id, record_id, details, created_at
           FROM audit_logs
           WHERE id > $1
           ORDER BY id ASC
           LIMIT $2`,
          [afterId, limit],
        );
        return result.rows.map(toAuditEntry);
      },
    },
  };
}

// ── Store ──────────────────────────────────────────────────────────────

export class PgStore implements Store {
  private readonly base: Repositories;

  readonly roles: Repositories['roles'];
  readonly users: Repositories['users'];
  readonly sessions: Repositories['sessions'];
  readonly categories: Repositories['categories'];
  readonly contents: Repositories['contents'];
  readonly approvals: Repositories['approvals'];
  readonly cooperations: Repositories['cooperations'];
  readonly audit: Repositories['audit'];

  constructor(
    private readonly pool: PgPool,
    private readonly logger: Logger,
  ) {
    const sql: Sql = (text, values) => this.pool.query(text, values);
    this.base = createRepositories(sql, async () => {
      throw new Error('Audit entries must be appended inside a transaction');
    });

    this.roles = this.base.roles;
    this.users = this.base.users;
    this.sessions = this.base.sessions;
    this.categories = this.base.categories;
    this.contents = this.base.contents;
    this.approvals = this.base.approvals;
    this.cooperations = this.base.cooperations;
    this.audit = {
      append: (entry) => this.transaction((tx) => tx.audit.append(entry)),
      listAfter: (afterId, limit) => this.base.audit.listAfter(afterId, limit),
    };
  }

  async transaction<T>(fn: (tx: Repositories) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let auditLocked = false;

    const sql: Sql = (text, values) => client.query(text, values);
    const tx = createRepositories(sql, async () => {
      if (!auditLocked) {
        await client.query('SELECT pg_advisory_xact_lock($1)', [AUDIT_LOCK_KEY]);
        auditLocked = true;
      }
    });

    try {
      await client.query('BEGIN');
      const result = await fn(tx);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        this.logger.error({ err: rollbackErr, component: 'db' }, 'Rollback failed');
      }
      throw err;
    } finally {
      client.release();
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
