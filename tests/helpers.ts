// =============================================================================
// PUBLISHING DESK — Integration Test Helpers
//
// Builds the real Express application over an in-memory store and drives
// it with supertest. All test accounts use the password 'test-password'.
// =============================================================================

import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../src/app';
import { PermissionEvaluator } from '../src/authorization/evaluator';
import { loadConfig } from '../src/config';
import { AppContext } from '../src/context';
import { createLogger } from '../src/observability/logger';
import { AuditLogEntry } from '../src/types/audit';
import { MemoryStore } from './memory-store';

export const PASSWORD = 'test-password';
export const JWT_SECRET = 'test-secret';

/** Seeded role ids (tests/fixtures/rbac-seed.json) */
export const ROLES = {
  Administrator: 1,
  User: 2,
  Staff: 3,
  Supervisor: 4,
} as const;

export type RoleName = keyof typeof ROLES;

export interface TestHarness {
  app: Express;
  store: MemoryStore;
  ctx: AppContext;
}

export interface TestAccount {
  id: number;
  username: string;
  token: string;
}

export async function buildTestApp(env: Record<string, string> = {}): Promise<TestHarness> {
  const config = loadConfig({
    NODE_ENV: 'test',
    JWT_SECRET,
    BCRYPT_ROUNDS: '4',
    RATE_LIMIT_AUTH_MAX: '1000',
    REGISTRATION_ROLE_SELECTION: 'true',
    LOG_LEVEL: 'silent',
    ...env,
  });
  const store = new MemoryStore();
  const evaluator = new PermissionEvaluator();
  await evaluator.refresh(store.roles);

  const ctx: AppContext = { config, store, evaluator, logger: createLogger(config.logging.level) };
  return { app: createApp(ctx), store, ctx };
}

// ── Accounts ───────────────────────────────────────────────────────────

export async function register(h: TestHarness, username: string, role: RoleName): Promise<number> {
  const res = await request(h.app)
    .post('/api/auth/register')
    .send({
      username,
      email: `${username}@example.com`,
      password: PASSWORD,
      full_name: `${username} Tester`,
      role_id: ROLES[role],
    });
  if (res.status !== 201) {
    throw new Error(`Registration failed for ${username}: ${JSON.stringify(res.body)}`);
  }
  return res.body.data.user_id;
}

export async function login(h: TestHarness, username: string): Promise<string> {
  const res = await request(h.app).post('/api/auth/login').send({ username, password: PASSWORD });
  if (res.status !== 200) {
    throw new Error(`Login failed for ${username}: ${JSON.stringify(res.body)}`);
  }
  return res.body.data.tokens.access_token;
}

/** Register and log in one account of the given role. */
export async function account(h: TestHarness, username: string, role: RoleName): Promise<TestAccount> {
  const id = await register(h, username, role);
  const token = await login(h, username);
  return { id, username, token };
}

// ── Requests ───────────────────────────────────────────────────────────

/** supertest calls carrying the account's bearer token */
export function as(h: TestHarness, who: TestAccount | string) {
  const token = typeof who === 'string' ? who : who.token;
  const bearer = `Bearer ${token}`;
  return {
    get: (path: string) => request(h.app).get(path).set('Authorization', bearer),
    post: (path: string, body: object = {}) =>
      request(h.app).post(path).set('Authorization', bearer).send(body),
    put: (path: string, body: object) => request(h.app).put(path).set('Authorization', bearer).send(body),
    delete: (path: string) => request(h.app).delete(path).set('Authorization', bearer),
  };
}

// ── Fixtures ───────────────────────────────────────────────────────────

export async function createCategory(h: TestHarness, who: TestAccount, name: string): Promise<number> {
  const res = await as(h, who).post('/api/categories', { name });
  if (res.status !== 201) {
    throw new Error(`Category creation failed: ${JSON.stringify(res.body)}`);
  }
  return res.body.data.category_id;
}

export async function createDraft(
  h: TestHarness,
  who: TestAccount,
  categoryId: number,
  title = 'Campus open day',
): Promise<number> {
  const res = await as(h, who).post('/api/contents', {
    category_id: categoryId,
    title,
    body: 'Doors open at nine.',
  });
  if (res.status !== 201) {
    throw new Error(`Content creation failed: ${JSON.stringify(res.body)}`);
  }
  return res.body.data.content_id;
}

// ── Audit trail ────────────────────────────────────────────────────────

/** Highest committed audit id, or 0 */
export function watermark(h: TestHarness): number {
  const entries = h.store.auditEntries();
  return entries.length > 0 ? entries[entries.length - 1].id : 0;
}

/** Committed entries with id above `after`, ascending */
export function auditAfter(h: TestHarness, after: number): AuditLogEntry[] {
  return h.store.auditEntries().filter((e) => e.id > after);
}

export function actionsAfter(h: TestHarness, after: number): string[] {
  return auditAfter(h, after).map((e) => e.action);
}
