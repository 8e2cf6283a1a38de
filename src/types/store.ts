// =============================================================================
// PUBLISHING DESK — Persistence Boundary
//
// All reads and writes go through these repositories. A Store hands out a
// transactional view via `transaction()`: everything written through the
// `tx` argument commits or rolls back together, which is how a workflow
// mutation and its audit entries become one unit of observable effect.
//
// `forUpdate` reads lock the row until the transaction ends, serializing
// concurrent transitions on the same record.
// =============================================================================

import { Role, RolePermissionGrant } from './roles';
import { NewSession, NewUser, SessionRecord, UserListFilter, UserRecord, UserUpdate } from './user';
import { CategoryFields, CategoryRecord } from './category';
import {
  ContentApprovalRecord,
  ContentFields,
  ContentRecord,
  ContentStatus,
  NewContent,
  NewContentApproval,
} from './content';
import { CooperationRecord, CooperationStatus, NewCooperation } from './cooperation';
import { AuditLogEntry, NewAuditEntry } from './audit';

export interface LockOptions {
  forUpdate?: boolean;
}

export interface RoleRepository {
  list(): Promise<Role[]>;
  findById(id: number): Promise<Role | null>;
  findByName(name: string): Promise<Role | null>;
  /** Full role→permission relation, resolved to permission names */
  listGrants(): Promise<RolePermissionGrant[]>;
}

export interface UserRepository {
  findById(id: number, opts?: LockOptions): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  /** True when either the username or the email is already registered */
  identityTaken(username: string, email: string): Promise<boolean>;
  insert(user: NewUser): Promise<UserRecord>;
  update(id: number, fields: UserUpdate): Promise<UserRecord>;
  setPassword(id: number, passwordHash: string): Promise<void>;
  list(filter: UserListFilter): Promise<UserRecord[]>;
}

export interface SessionRepository {
  insert(session: NewSession): Promise<void>;
  findActive(tokenId: string): Promise<SessionRecord | null>;
  terminate(tokenId: string): Promise<boolean>;
  /** Terminate every open session of a user; returns how many were open */
  terminateAllForUser(userId: number): Promise<number>;
}

export interface CategoryRepository {
  list(): Promise<CategoryRecord[]>;
  findById(id: number, opts?: LockOptions): Promise<CategoryRecord | null>;
  findByName(name: string): Promise<CategoryRecord | null>;
  insert(fields: CategoryFields, createdBy: number): Promise<CategoryRecord>;
  update(id: number, fields: CategoryFields): Promise<CategoryRecord>;
  delete(id: number): Promise<void>;
  /** Number of contents filed under the category */
  countContents(id: number): Promise<number>;
}

export interface ContentRepository {
  findById(id: number, opts?: LockOptions): Promise<ContentRecord | null>;
  list(filter: { authorId?: number; status?: ContentStatus }): Promise<ContentRecord[]>;
  insert(content: NewContent): Promise<ContentRecord>;
  updateFields(id: number, fields: ContentFields): Promise<ContentRecord>;
  updateStatus(id: number, status: ContentStatus): Promise<ContentRecord>;
  delete(id: number): Promise<void>;
}

export interface ApprovalRepository {
  /** Ordered oldest first */
  listForContent(contentId: number): Promise<ContentApprovalRecord[]>;
  insert(record: NewContentApproval): Promise<ContentApprovalRecord>;
}

export interface CooperationRepository {
  findById(id: number, opts?: LockOptions): Promise<CooperationRecord | null>;
  list(filter: { requesterId?: number }): Promise<CooperationRecord[]>;
  insert(coop: NewCooperation): Promise<CooperationRecord>;
  updateStatus(
    id: number,
    status: CooperationStatus,
    actorId: number,
  ): Promise<CooperationRecord>;
}

export interface AuditRepository {
  append(entry: NewAuditEntry): Promise<AuditLogEntry>;
  /** Entries with id > afterId, ascending */
  listAfter(afterId: number, limit: number): Promise<AuditLogEntry[]>;
}

export interface Repositories {
  roles: RoleRepository;
  users: UserRepository;
  sessions: SessionRepository;
  categories: CategoryRepository;
  contents: ContentRepository;
  approvals: ApprovalRepository;
  cooperations: CooperationRepository;
  audit: AuditRepository;
}

export interface Store extends Repositories {
  transaction<T>(fn: (tx: Repositories) => Promise<T>): Promise<T>;
  /** Lightweight liveness probe for the health endpoint */
  ping(): Promise<void>;
  close(): Promise<void>;
}
