// =============================================================================
// PUBLISHING DESK — Test Suite 03: Role Enforcement
//
// Every 403 leaves exactly one ACCESS_DENIED entry naming the endpoint,
// the caller's role and the permission that was missing.
// =============================================================================

import request from 'supertest';
import {
  account,
  actionsAfter,
  as,
  auditAfter,
  buildTestApp,
  createCategory,
  createDraft,
  TestAccount,
  TestHarness,
  watermark,
} from './helpers';

describe('Role Enforcement', () => {
  let h: TestHarness;
  let admin: TestAccount;
  let author: TestAccount;
  let staff: TestAccount;

  beforeEach(async () => {
    h = await buildTestApp();
    admin = await account(h, 'admin', 'Administrator');
    author = await account(h, 'author', 'User');
    staff = await account(h, 'staff', 'Staff');
  });

  // ── Permission middleware ─────────────────────────────────────────────

  describe('Missing permission', () => {
    test('User approving content gets 403 and one ACCESS_DENIED entry', async () => {
      const categoryId = await createCategory(h, admin, 'News');
      const contentId = await createDraft(h, author, categoryId);
      const mark = watermark(h);

      const res = await as(h, author).post(`/api/contents/${contentId}/approve`, { notes: 'self' });
      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: 'Insufficient permissions', code: 'FORBIDDEN' });

      const entries = auditAfter(h, mark);
      expect(entries).toHaveLength(1);
      expect(entries[0].action).toBe('ACCESS_DENIED');
      expect(entries[0].userId).toBe(author.id);
      expect(entries[0].recordId).toBeNull();
      expect(entries[0].details).toEqual({
        endpoint: `/api/contents/${contentId}/approve`,
        method: 'POST',
        role: 'User',
        role_id: 2,
        permission: 'content.approve',
        reason: 'missing_permission',
        request_id: expect.stringMatching(/^desk-/),
      });
    });

    test('the denied action leaves the content untouched', async () => {
      const categoryId = await createCategory(h, admin, 'News');
      const contentId = await createDraft(h, author, categoryId);
      await as(h, author).post(`/api/contents/${contentId}/submit`);

      await as(h, author).post(`/api/contents/${contentId}/approve`);

      const res = await as(h, author).get(`/api/contents/${contentId}`);
      expect(res.body.data.status).toBe('pending');
    });

    test('Staff cannot publish', async () => {
      const mark = watermark(h);
      const res = await as(h, staff).post('/api/contents/1/publish');
      expect(res.status).toBe(403);

      const [entry] = auditAfter(h, mark);
      expect(entry.details.permission).toBe('content.publish');
      expect(entry.details.role).toBe('Staff');
    });

    test('Staff cannot delete categories', async () => {
      const categoryId = await createCategory(h, admin, 'News');
      const res = await as(h, staff).delete(`/api/categories/${categoryId}`);
      expect(res.status).toBe(403);

      const categories = await as(h, staff).get('/api/categories');
      expect(categories.body.data).toHaveLength(1);
    });

    test('User cannot read the audit trail; the recorded endpoint drops the query', async () => {
      const mark = watermark(h);
      const res = await as(h, author).get('/api/audit-logs?after=0&limit=5');
      expect(res.status).toBe(403);

      const [entry] = auditAfter(h, mark);
      expect(entry.details.endpoint).toBe('/api/audit-logs');
      expect(entry.details.method).toBe('GET');
      expect(entry.details.permission).toBe('audit.read');
    });

    test('unknown audit paths are 404 for everyone, with no denial recorded', async () => {
      const mark = watermark(h);
      const res = await as(h, author).get('/api/audit-logs/nope');
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Not found', code: 'NOT_FOUND' });
      expect(auditAfter(h, mark)).toEqual([]);
    });

    test('User cannot list or create users', async () => {
      const mark = watermark(h);

      expect((await as(h, author).get('/api/users')).status).toBe(403);
      expect(
        (
          await as(h, author).post('/api/users', {
            username: 'intruder',
            email: 'intruder@example.com',
            password: 'test-password',
            full_name: 'In Truder',
            role_id: 1,
          })
        ).status,
      ).toBe(403);

      expect(actionsAfter(h, mark)).toEqual(['ACCESS_DENIED', 'ACCESS_DENIED']);
    });

    test('Staff cannot approve cooperation requests', async () => {
      const mark = watermark(h);
      const res = await as(h, staff).post('/api/cooperations/1/approve');
      expect(res.status).toBe(403);

      const [entry] = auditAfter(h, mark);
      expect(entry.details.permission).toBe('approve_coop');
    });
  });

  // ── Ownership checks ──────────────────────────────────────────────────

  describe('Ownership', () => {
    test('another User cannot read a draft and the denial is recorded', async () => {
      const other = await account(h, 'other', 'User');
      const categoryId = await createCategory(h, admin, 'News');
      const contentId = await createDraft(h, author, categoryId);
      const mark = watermark(h);

      const res = await as(h, other).get(`/api/contents/${contentId}`);
      expect(res.status).toBe(403);

      const entries = auditAfter(h, mark);
      expect(entries).toHaveLength(1);
      expect(entries[0].action).toBe('ACCESS_DENIED');
      expect(entries[0].details).toMatchObject({
        endpoint: `/api/contents/${contentId}`,
        role: 'User',
        permission: 'content.read_all',
        reason: 'not_owner',
      });
    });

    test('only the author can submit', async () => {
      const other = await account(h, 'other', 'User');
      const categoryId = await createCategory(h, admin, 'News');
      const contentId = await createDraft(h, author, categoryId);
      const mark = watermark(h);

      const res = await as(h, other).post(`/api/contents/${contentId}/submit`);
      expect(res.status).toBe(403);
      expect(res.body.error).toBe('Only the author can submit this content');

      const entries = auditAfter(h, mark);
      expect(entries.map((e) => e.action)).toEqual(['ACCESS_DENIED']);
      expect(entries[0].details.reason).toBe('not_owner');
      expect(entries[0].details.permission).toBeNull();
    });

    test('content.read_all holders can read any item', async () => {
      const categoryId = await createCategory(h, admin, 'News');
      const contentId = await createDraft(h, author, categoryId);

      const res = await as(h, staff).get(`/api/contents/${contentId}`);
      expect(res.status).toBe(200);
      expect(res.body.data.author_id).toBe(author.id);
    });

    test('listing shows a User only their own items', async () => {
      const other = await account(h, 'other', 'User');
      const categoryId = await createCategory(h, admin, 'News');
      await createDraft(h, author, categoryId, 'Mine');
      await createDraft(h, other, categoryId, 'Theirs');

      const mine = await as(h, author).get('/api/contents');
      expect(mine.body.data.map((c: { title: string }) => c.title)).toEqual(['Mine']);

      const all = await as(h, staff).get('/api/contents');
      expect(all.body.data.map((c: { title: string }) => c.title)).toEqual(['Theirs', 'Mine']);
    });
  });

  // ── Authentication precedes authorization ─────────────────────────────

  test('missing credentials are 401, never 403, and record no denial', async () => {
    const mark = watermark(h);
    const res = await request(h.app).post('/api/contents/1/approve');
    expect(res.status).toBe(401);
    expect(actionsAfter(h, mark)).toEqual([]);
  });

  test('Administrator reaches every guarded route', async () => {
    expect((await as(h, admin).get('/api/audit-logs')).status).toBe(200);
    expect((await as(h, admin).get('/api/users')).status).toBe(200);
    expect((await as(h, admin).get('/api/cooperations')).status).toBe(200);
  });
});
