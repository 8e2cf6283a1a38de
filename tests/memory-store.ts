// =============================================================================
// PUBLISHING DESK — In-Memory Store for Tests
//
// Stands in for PostgreSQL behind the Store interface. Transactions are
// serialized and run against a cloned copy of the state that replaces
// the committed state only when the callback resolves, so a thrown error
// discards every write the transaction made (audit entries included).
// =============================================================================

import seed from './fixtures/rbac-seed.json';
import { AuditLogEntry } from '../src/types/audit';
import { CategoryRecord } from '../src/types/category';
import { ContentApprovalRecord, ContentRecord } from '../src/types/content';
import { CooperationRecord } from '../src/types/cooperation';
import { ConflictError } from '../src/types/errors';
import { Role } from '../src/types/roles';
import { Repositories, Store } from '../src/types/store';
import { SessionRecord, UserRecord } from '../src/types/user';

type StoredUser = Omit<UserRecord, 'roleName'>;
type StoredApproval = Omit<ContentApprovalRecord, 'approverName'>;

interface MemoryState {
  roles: Role[];
  grants: Array<{ roleId: number; permission: string }>;
  users: StoredUser[];
  sessions: SessionRecord[];
  categories: CategoryRecord[];
  contents: ContentRecord[];
  approvals: StoredApproval[];
  cooperations: CooperationRecord[];
  audit: AuditLogEntry[];
  nextId: Record<'users' | 'categories' | 'contents' | 'approvals' | 'cooperations' | 'audit', number>;
}

function seededState(): MemoryState {
  return {
    roles: seed.roles.map((r) => ({ id: r.id, name: r.name })),
    grants: seed.roles.flatMap((r) => r.permissions.map((permission) => ({ roleId: r.id, permission }))),
    users: [],
    sessions: [],
    categories: [],
    contents: [],
    approvals: [],
    cooperations: [],
    audit: [],
    nextId: { users: 1, categories: 1, contents: 1, approvals: 1, cooperations: 1, audit: 1 },
  };
}

function required<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new Error(`${what} not found`);
  }
  return value;
}

function repositoriesOver(
  state: () => MemoryState,
  hooks: { beforeAuditAppend: () => void },
): Repositories {
  const s = state;
  const nextId = (key: keyof MemoryState['nextId']) => s().nextId[key]++;

  const withRoleName = (user: StoredUser): UserRecord => ({
    ...user,
    roleName: required(s().roles.find((r) => r.id === user.roleId), 'role').name,
  });
  const withApproverName = (a: StoredApproval): ContentApprovalRecord => ({
    ...a,
    approverName: required(s().users.find((u) => u.id === a.approverId), 'approver').fullName,
  });

  return {
    roles: {
      async list() {
        return s().roles.map((r) => ({ ...r }));
      },
      async findById(id) {
        const role = s().roles.find((r) => r.id === id);
        return role ? { ...role } : null;
      },
      async findByName(name) {
        const role = s().roles.find((r) => r.name === name);
        return role ? { ...role } : null;
      },
      async listGrants() {
        return s().grants.map((g) => ({ ...g }));
      },
    },

    users: {
      async findById(id) {
        const user = s().users.find((u) => u.id === id);
        return user ? withRoleName(user) : null;
      },
      async findByUsername(username) {
        const user = s().users.find((u) => u.username === username);
        return user ? withRoleName(user) : null;
      },
      async findByEmail(email) {
        const user = s().users.find((u) => u.email === email);
        return user ? withRoleName(user) : null;
      },
      async identityTaken(username, email) {
        return s().users.some((u) => u.username === username || u.email === email);
      },
      async insert(user) {
        const stored: StoredUser = {
          ...user,
          id: nextId('users'),
          isActive: true,
          createdAt: new Date(),
        };
        s().users.push(stored);
        return withRoleName(stored);
      },
      async update(id, fields) {
        const stored: StoredUser = { ...required(s().users.find((u) => u.id === id), 'user'), ...fields };
        s().users = s().users.map((u) => (u.id === id ? stored : u));
        return withRoleName(stored);
      },
      async setPassword(id, passwordHash) {
        const stored: StoredUser = { ...required(s().users.find((u) => u.id === id), 'user'), passwordHash };
        s().users = s().users.map((u) => (u.id === id ? stored : u));
      },
      async list(filter) {
        const needle = filter.search?.toLowerCase();
        return s()
          .users.filter((u) => filter.roleId === undefined || u.roleId === filter.roleId)
          .filter((u) => filter.isActive === undefined || u.isActive === filter.isActive)
          .filter(
            (u) =>
              !needle ||
              [u.username, u.fullName, u.email].some((v) => v.toLowerCase().includes(needle)),
          )
          .slice(filter.offset, filter.offset + filter.limit)
          .map(withRoleName);
      },
    },

    sessions: {
      async insert(session) {
        s().sessions.push({
          id: session.id,
          userId: session.userId,
          tokenId: session.tokenId,
          createdAt: new Date(),
          terminatedAt: null,
        });
      },
      async findActive(tokenId) {
        const session = s().sessions.find((x) => x.tokenId === tokenId && x.terminatedAt === null);
        return session ? { ...session } : null;
      },
      async terminate(tokenId) {
        const active = s().sessions.some((x) => x.tokenId === tokenId && x.terminatedAt === null);
        const now = new Date();
        s().sessions = s().sessions.map((x) =>
          x.tokenId === tokenId && x.terminatedAt === null ? { ...x, terminatedAt: now } : x,
        );
        return active;
      },
      async terminateAllForUser(userId) {
        const count = s().sessions.filter((x) => x.userId === userId && x.terminatedAt === null).length;
        const now = new Date();
        s().sessions = s().sessions.map((x) =>
          x.userId === userId && x.terminatedAt === null ? { ...x, terminatedAt: now } : x,
        );
        return count;
      },
    },

    categories: {
      async list() {
        return s()
          .categories.map((c) => ({ ...c }))
          .sort((a, b) => a.name.localeCompare(b.name));
      },
      async findById(id) {
        const category = s().categories.find((c) => c.id === id);
        return category ? { ...category } : null;
      },
      async findByName(name) {
        const category = s().categories.find((c) => c.name === name);
        return category ? { ...category } : null;
      },
      async insert(fields, createdBy) {
        if (s().categories.some((c) => c.name === fields.name)) {
          throw new ConflictError('Key (name) already exists');
        }
        const now = new Date();
        const category: CategoryRecord = {
          ...fields,
          id: nextId('categories'),
          createdBy,
          createdAt: now,
          updatedAt: now,
        };
        s().categories.push(category);
        return { ...category };
      },
      async update(id, fields) {
        const category: CategoryRecord = {
          ...required(s().categories.find((c) => c.id === id), 'category'),
          ...fields,
          updatedAt: new Date(),
        };
        s().categories = s().categories.map((c) => (c.id === id ? category : c));
        return { ...category };
      },
      async delete(id) {
        s().categories = s().categories.filter((c) => c.id !== id);
      },
      async countContents(id) {
        return s().contents.filter((c) => c.categoryId === id).length;
      },
    },

    contents: {
      async findById(id) {
        const content = s().contents.find((c) => c.id === id);
        return content ? { ...content } : null;
      },
      async list(filter) {
        return s()
          .contents.filter((c) => filter.authorId === undefined || c.authorId === filter.authorId)
          .filter((c) => !filter.status || c.status === filter.status)
          .map((c) => ({ ...c }))
          .sort((a, b) => b.id - a.id);
      },
      async insert(content) {
        const now = new Date();
        const record: ContentRecord = {
          ...content,
          id: nextId('contents'),
          status: 'draft',
          createdAt: now,
          updatedAt: now,
          publishedAt: null,
        };
        s().contents.push(record);
        return { ...record };
      },
      async updateFields(id, fields) {
        const content: ContentRecord = {
          ...required(s().contents.find((c) => c.id === id), 'content'),
          ...fields,
          updatedAt: new Date(),
        };
        s().contents = s().contents.map((c) => (c.id === id ? content : c));
        return { ...content };
      },
      async updateStatus(id, status) {
        const existing = required(s().contents.find((c) => c.id === id), 'content');
        const now = new Date();
        const content: ContentRecord = {
          ...existing,
          status,
          updatedAt: now,
          publishedAt: status === 'published' ? now : existing.publishedAt,
        };
        s().contents = s().contents.map((c) => (c.id === id ? content : c));
        return { ...content };
      },
      async delete(id) {
        s().contents = s().contents.filter((c) => c.id !== id);
        s().approvals = s().approvals.filter((a) => a.contentId !== id);
      },
    },

    approvals: {
      async listForContent(contentId) {
        return s()
          .approvals.filter((a) => a.contentId === contentId)
          .sort((a, b) => a.id - b.id)
          .map(withApproverName);
      },
      async insert(record) {
        const stored: StoredApproval = { ...record, id: nextId('approvals'), createdAt: new Date() };
        s().approvals.push(stored);
        return withApproverName(stored);
      },
    },

    cooperations: {
      async findById(id) {
        const coop = s().cooperations.find((c) => c.id === id);
        return coop ? { ...coop } : null;
      },
      async list(filter) {
        return s()
          .cooperations.filter((c) => filter.requesterId === undefined || c.requesterId === filter.requesterId)
          .map((c) => ({ ...c }))
          .sort((a, b) => b.id - a.id);
      },
      async insert(coop) {
        const now = new Date();
        const record: CooperationRecord = {
          ...coop,
          id: nextId('cooperations'),
          status: 'submitted',
          verifiedBy: null,
          verifiedAt: null,
          approvedBy: null,
          approvedAt: null,
          createdAt: now,
          updatedAt: now,
        };
        s().cooperations.push(record);
        return { ...record };
      },
      async updateStatus(id, status, actorId) {
        const now = new Date();
        const coop: CooperationRecord = {
          ...required(s().cooperations.find((c) => c.id === id), 'cooperation'),
          status,
          updatedAt: now,
        };
        if (status === 'verified') {
          coop.verifiedBy = actorId;
          coop.verifiedAt = now;
        } else if (status === 'approved') {
          coop.approvedBy = actorId;
          coop.approvedAt = now;
        }
        s().cooperations = s().cooperations.map((c) => (c.id === id ? coop : c));
        return { ...coop };
      },
    },

    audit: {
      async append(entry) {
        hooks.beforeAuditAppend();
        const record: AuditLogEntry = {
          id: nextId('audit'),
          action: entry.action,
          userId: entry.userId,
          recordId: entry.recordId,
          details: entry.details,
          createdAt: new Date(),
        };
        s().audit.push(record);
        return { ...record };
      },
      async listAfter(afterId, limit) {
        return s()
          .audit.filter((e) => e.id > afterId)
          .sort((a, b) => a.id - b.id)
          .slice(0, limit)
          .map((e) => ({ ...e }));
      },
    },
  };
}

export class MemoryStore implements Store {
  private state: MemoryState = seededState();
  private queue: Promise<void> = Promise.resolve();

  /** When set, every audit append throws (to exercise rollback) */
  failAuditAppends = false;

  private readonly committed: Repositories;

  constructor() {
    this.committed = repositoriesOver(() => this.state, {
      beforeAuditAppend: () => this.checkAuditAvailable(),
    });
  }

  get roles() {
    return this.committed.roles;
  }
  get users() {
    return this.committed.users;
  }
  get sessions() {
    return this.committed.sessions;
  }
  get categories() {
    return this.committed.categories;
  }
  get contents() {
    return this.committed.contents;
  }
  get approvals() {
    return this.committed.approvals;
  }
  get cooperations() {
    return this.committed.cooperations;
  }
  get audit() {
    return this.committed.audit;
  }

  /** Rewrite the role→permission relation out of band */
  setGrants(roleId: number, permissions: string[]): void {
    this.state = {
      ...this.state,
      grants: [
        ...this.state.grants.filter((g) => g.roleId !== roleId),
        ...permissions.map((permission) => ({ roleId, permission })),
      ],
    };
  }

  /** Committed audit entries, ascending by id */
  auditEntries(): AuditLogEntry[] {
    return [...this.state.audit];
  }

  async transaction<T>(fn: (tx: Repositories) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const draft = structuredClone(this.state);
      const result = await fn(
        repositoriesOver(() => draft, { beforeAuditAppend: () => this.checkAuditAvailable() }),
      );
      this.state = draft;
      return result;
    });
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}

  private checkAuditAvailable(): void {
    if (this.failAuditAppends) {
      throw new Error('audit store unavailable');
    }
  }
}
