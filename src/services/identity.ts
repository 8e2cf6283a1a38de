// =============================================================================
// PUBLISHING DESK — Identity Service
//
// Registration, login/logout and user administration. Credential hashing
// is bcryptjs; tokens come from auth/tokens. Every successful mutation and
// every failed login is written to the audit trail in the same transaction
// as its effect.
// =============================================================================

import bcrypt from 'bcryptjs';
import { v4 as uuidv4 } from 'uuid';
import { AppContext } from '../context';
import { AuthenticatedUser } from '../types/auth';
import {
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  UnauthenticatedError,
  ValidationError,
} from '../types/errors';
import { Role } from '../types/roles';
import { Repositories } from '../types/store';
import { UserListFilter, UserRecord, UserUpdate } from '../types/user';
import { issueAccessToken, IssuedToken } from '../auth/tokens';
import { recordAuditEvent, recordRowChange } from './audit';

export interface RegistrationInput {
  username: string;
  email: string;
  password: string;
  fullName: string;
  roleId?: number;
}

/** Fields an administrator may change; omitted fields keep their value */
export interface UserChanges {
  fullName?: string;
  email?: string;
  isActive?: boolean;
}

export interface LoginResult {
  issued: IssuedToken;
  user: UserRecord;
}

async function resolveRole(ctx: AppContext, requestedRoleId: number | undefined): Promise<Role> {
  if (requestedRoleId !== undefined) {
    const role = await ctx.store.roles.findById(requestedRoleId);
    if (!role) {
      throw new ValidationError(`Unknown role_id ${requestedRoleId}`);
    }
    return role;
  }

  const fallback = await ctx.store.roles.findByName(ctx.config.auth.defaultRoleName);
  if (!fallback) {
    throw new Error(`Default role '${ctx.config.auth.defaultRoleName}' is not seeded`);
  }
  return fallback;
}

async function insertUser(
  tx: Repositories,
  input: RegistrationInput,
  role: Role,
  passwordHash: string,
  actorId: number | null,
): Promise<UserRecord> {
  if (await tx.users.identityTaken(input.username, input.email)) {
    throw new ConflictError('Username or email already registered');
  }

  const user = await tx.users.insert({
    username: input.username,
    email: input.email,
    passwordHash,
    fullName: input.fullName,
    roleId: role.id,
  });

  await recordRowChange(tx, {
    kind: 'INSERT',
    table: 'users',
    userId: actorId ?? user.id,
    recordId: user.id,
    newValues: { username: user.username, email: user.email, role_id: role.id },
  });

  return user;
}

/**
 * Public self-registration. A requested role is honoured only when
 * registration role selection is enabled in config.
 */
export async function registerUser(ctx: AppContext, input: RegistrationInput): Promise<UserRecord> {
  const requested = ctx.config.auth.registrationRoleSelection ? input.roleId : undefined;
  const role = await resolveRole(ctx, requested);
  const passwordHash = await bcrypt.hash(input.password, ctx.config.auth.bcryptRounds);

  return ctx.store.transaction(async (tx) => {
    const user = await insertUser(tx, input, role, passwordHash, null);
    await recordAuditEvent(tx, {
      action: 'REGISTER',
      userId: user.id,
      recordId: user.id,
      details: { username: user.username, role: role.name },
    });
    return user;
  });
}

/** Administrative account creation (requires users.create at the route). */
export async function createUser(
  ctx: AppContext,
  actor: AuthenticatedUser,
  input: RegistrationInput,
): Promise<UserRecord> {
  const role = await resolveRole(ctx, input.roleId);
  const passwordHash = await bcrypt.hash(input.password, ctx.config.auth.bcryptRounds);

  return ctx.store.transaction(async (tx) => {
    const user = await insertUser(tx, input, role, passwordHash, actor.id);
    await recordAuditEvent(tx, {
      action: 'USER_CREATED',
      userId: actor.id,
      recordId: user.id,
      details: { created_user_id: user.id, username: user.username, role: role.name },
    });
    return user;
  });
}

/**
 * Authenticate with username and password. Returns a signed access token
 * and opens a session. A failed attempt records LOGIN_FAILED and issues
 * nothing.
 */
export async function login(
  ctx: AppContext,
  credentials: { username: string; password: string },
  client: { ip: string | null; userAgent: string | null },
): Promise<LoginResult> {
  const user = await ctx.store.users.findByUsername(credentials.username);

  let failure: string | null = null;
  if (!user) {
    failure = 'unknown_user';
  } else if (!user.isActive) {
    failure = 'account_inactive';
  } else if (!(await bcrypt.compare(credentials.password, user.passwordHash))) {
    failure = 'wrong_password';
  }

  if (!user || failure) {
    await ctx.store.transaction((tx) =>
      recordAuditEvent(tx, {
        action: 'LOGIN_FAILED',
        userId: user?.id ?? null,
        details: { username: credentials.username, reason: failure, ip: client.ip },
      }),
    );
    throw new UnauthenticatedError('Invalid credentials');
  }

  const issued = issueAccessToken(
    { userId: user.id, roleId: user.roleId, roleName: user.roleName },
    ctx.config.jwt,
  );
  const sessionId = uuidv4();

  await ctx.store.transaction(async (tx) => {
    await tx.sessions.insert({
      id: sessionId,
      userId: user.id,
      tokenId: issued.tokenId,
      ipAddress: client.ip,
      userAgent: client.userAgent,
    });
    await recordAuditEvent(tx, {
      action: 'LOGIN',
      userId: user.id,
      recordId: user.id,
      details: { session_id: sessionId, ip: client.ip, user_agent: client.userAgent },
    });
  });

  return { issued, user };
}

/** Terminate the session behind the current token. */
export async function logout(ctx: AppContext, actor: AuthenticatedUser): Promise<void> {
  await ctx.store.transaction(async (tx) => {
    await tx.sessions.terminate(actor.tokenId);
    await recordAuditEvent(tx, {
      action: 'LOGOUT',
      userId: actor.id,
      recordId: actor.id,
      details: { token_id: actor.tokenId },
    });
  });
}

// ── Account administration ─────────────────────────────────────────────

function accountSnapshot(user: UserRecord): Record<string, unknown> {
  return { full_name: user.fullName, email: user.email, is_active: user.isActive };
}

async function lockUser(tx: Repositories, id: number): Promise<UserRecord> {
  const user = await tx.users.findById(id, { forUpdate: true });
  if (!user) {
    throw new NotFoundError('User not found');
  }
  return user;
}

/**
 * Write the new account fields and their UPDATE row change. Turning an
 * account inactive also terminates every session it holds.
 */
async function applyAccountChanges(
  tx: Repositories,
  actor: AuthenticatedUser,
  existing: UserRecord,
  changes: UserChanges,
): Promise<{ updated: UserRecord; changed: string[]; sessionsTerminated: number }> {
  if (changes.isActive === false && existing.id === actor.id) {
    throw new ValidationError('Cannot deactivate your own account');
  }

  const next: UserUpdate = {
    fullName: changes.fullName ?? existing.fullName,
    email: changes.email ?? existing.email,
    isActive: changes.isActive ?? existing.isActive,
  };

  if (next.email !== existing.email) {
    const clash = await tx.users.findByEmail(next.email);
    if (clash && clash.id !== existing.id) {
      throw new ConflictError('Email already registered');
    }
  }

  const updated = await tx.users.update(existing.id, next);
  const sessionsTerminated =
    existing.isActive && !updated.isActive ? await tx.sessions.terminateAllForUser(existing.id) : 0;

  const before = accountSnapshot(existing);
  const after = accountSnapshot(updated);
  const changed = Object.keys(after).filter((key) => before[key] !== after[key]);

  await recordRowChange(tx, {
    kind: 'UPDATE',
    table: 'users',
    userId: actor.id,
    recordId: existing.id,
    oldValues: before,
    newValues: after,
  });

  return { updated, changed, sessionsTerminated };
}

/** Edit full name, email or active flag (requires users.update at the route). */
export async function updateUser(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
  changes: UserChanges,
): Promise<UserRecord> {
  return ctx.store.transaction(async (tx) => {
    const existing = await lockUser(tx, id);
    const { updated, changed, sessionsTerminated } = await applyAccountChanges(tx, actor, existing, changes);

    await recordAuditEvent(tx, {
      action: 'USER_UPDATED',
      userId: actor.id,
      recordId: id,
      details: { username: updated.username, changed, sessions_terminated: sessionsTerminated },
    });
    return updated;
  });
}

/** Deactivate an account and end its sessions (requires users.delete). */
export async function deactivateUser(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
): Promise<UserRecord> {
  return ctx.store.transaction(async (tx) => {
    const existing = await lockUser(tx, id);
    if (!existing.isActive) {
      throw new InvalidTransitionError('User is already inactive', 'inactive', 'deactivate');
    }

    const { updated, sessionsTerminated } = await applyAccountChanges(tx, actor, existing, { isActive: false });

    await recordAuditEvent(tx, {
      action: 'USER_DEACTIVATED',
      userId: actor.id,
      recordId: id,
      details: { username: updated.username, sessions_terminated: sessionsTerminated },
    });
    return updated;
  });
}

/**
 * Set a new password chosen by an administrator. Open sessions are
 * terminated; the hash never reaches the audit trail.
 */
export async function resetPassword(
  ctx: AppContext,
  actor: AuthenticatedUser,
  id: number,
  password: string,
): Promise<void> {
  const passwordHash = await bcrypt.hash(password, ctx.config.auth.bcryptRounds);

  await ctx.store.transaction(async (tx) => {
    const user = await lockUser(tx, id);
    await tx.users.setPassword(id, passwordHash);
    const sessionsTerminated = await tx.sessions.terminateAllForUser(id);

    await recordRowChange(tx, {
      kind: 'UPDATE',
      table: 'users',
      userId: actor.id,
      recordId: id,
      newValues: { password_reset: true },
    });
    await recordAuditEvent(tx, {
      action: 'PASSWORD_RESET',
      userId: actor.id,
      recordId: id,
      details: { username: user.username, sessions_terminated: sessionsTerminated },
    });
  });
}

export async function getUser(ctx: AppContext, id: number): Promise<UserRecord> {
  const user = await ctx.store.users.findById(id);
  if (!user) {
    throw new NotFoundError('User not found');
  }
  return user;
}

export async function listUsers(ctx: AppContext, filter: UserListFilter): Promise<UserRecord[]> {
  return ctx.store.users.list(filter);
}

export async function listRoles(ctx: AppContext): Promise<Role[]> {
  return ctx.store.roles.list();
}
