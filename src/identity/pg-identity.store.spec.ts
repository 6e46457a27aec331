import { QueryResult, QueryResultRow } from 'pg';
import { DuplicateEmailError, InternalError, NotFoundError } from '../common/errors';
import { DatabaseService } from '../database/database.service';
import { PgIdentityStore } from './pg-identity.store';

function result<R extends QueryResultRow>(rows: R[], rowCount: number = rows.length): QueryResult<R> {
  return { rows, rowCount, command: '', oid: 0, fields: [] };
}

function pgError(code: string): Error {
  return Object.assign(new Error(`pg error ${code}`), { code });
}

const createdAt = new Date('2026-01-01T00:00:00.000Z');

describe('PgIdentityStore', () => {
  let db: DatabaseService;
  let query: jest.SpyInstance;
  let store: PgIdentityStore;

  beforeEach(() => {
    db = new DatabaseService({ driver: 'postgres', databaseUrl: 'postgres://localhost/test', timeoutMs: 1000 });
    query = jest.spyOn(db, 'query');
    store = new PgIdentityStore(db);
  });

  it('inserts a user and returns the stored row', async () => {
    const row = {
      id: 'user-1',
      email: 'A@x.com',
      passwordHash: 'hash',
      fullName: null,
      isActive: true,
      createdAt,
    };
    query.mockResolvedValueOnce(result([row]));

    await expect(store.createUser({ email: 'A@x.com', passwordHash: 'hash' })).resolves.toEqual(row);

    const [sql, values] = query.mock.calls[0];
    expect(sql).toContain('INSERT INTO users');
    expect(values).toEqual([expect.any(String), 'A@x.com', 'hash', null]);
  });

  it('maps a unique violation to a duplicate email', async () => {
    query.mockRejectedValueOnce(pgError('23505'));

    await expect(store.createUser({ email: 'a@x.com', passwordHash: 'hash' })).rejects.toThrow(DuplicateEmailError);
  });

  it('looks emails up case-insensitively', async () => {
    query.mockResolvedValueOnce(result([]));

    await expect(store.findUserByEmail('A@X.com')).resolves.toBeNull();
    expect(query.mock.calls[0][0]).toContain('lower(email) = lower($1)');
    expect(query.mock.calls[0][1]).toEqual(['A@X.com']);
  });

  it('only overwrites the fields a patch names', async () => {
    query.mockResolvedValueOnce(
      result([{ id: 'user-1', email: 'a@x.com', passwordHash: 'hash', fullName: 'Ada', isActive: false, createdAt }]),
    );

    await store.updateUser('user-1', { isActive: false });

    expect(query.mock.calls[0][1]).toEqual(['user-1', false, null, null, false]);
  });

  it('reports an update of an unknown user', async () => {
    query.mockResolvedValueOnce(result([]));

    await expect(store.updateUser('missing', { fullName: 'Ada' })).rejects.toThrow(NotFoundError);
  });

  it('upserts bindings and maps a foreign key violation to not found', async () => {
    query.mockResolvedValueOnce(result([{ tenantId: 't1', userId: 'u1', role: 'admin', createdAt }]));
    await expect(store.bind('t1', 'u1', 'admin')).resolves.toEqual({
      tenantId: 't1',
      userId: 'u1',
      role: 'admin',
      createdAt,
    });
    expect(query.mock.calls[0][0]).toContain('ON CONFLICT (tenant_id, user_id) DO UPDATE');

    query.mockRejectedValueOnce(pgError('23503'));
    await expect(store.bind('t1', 'missing', 'member')).rejects.toThrow('Tenant or user not found');
  });

  it('rejects a stored role outside the role set', async () => {
    query.mockResolvedValueOnce(result([{ role: 'superuser' }]));

    await expect(store.findBinding('t1', 'u1')).rejects.toThrow(InternalError);
  });

  it('returns null for a missing binding', async () => {
    query.mockResolvedValueOnce(result([]));

    await expect(store.findBinding('t1', 'u1')).resolves.toBeNull();
  });

  it('reports deletion of an unknown tenant', async () => {
    query.mockResolvedValueOnce(result([], 0));

    await expect(store.deleteTenant('missing')).rejects.toThrow('Tenant not found');
  });

  it('reports whether a binding was removed', async () => {
    query.mockResolvedValueOnce(result([], 1)).mockResolvedValueOnce(result([], 0));

    await expect(store.unbind('t1', 'u1')).resolves.toBe(true);
    await expect(store.unbind('t1', 'u1')).resolves.toBe(false);
  });
});
