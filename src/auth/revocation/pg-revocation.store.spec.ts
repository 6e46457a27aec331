import { QueryResult } from 'pg';
import { DatabaseService } from '../../database/database.service';
import { PgRevocationStore } from './pg-revocation.store';

function result(rowCount: number | null): QueryResult {
  return { rows: [], rowCount, command: '', oid: 0, fields: [] };
}

describe('PgRevocationStore', () => {
  const record = {
    jti: 'jti-1',
    revokedAt: new Date('2026-01-01T00:00:00.000Z'),
    expiresAt: new Date('2026-01-08T00:00:00.000Z'),
  };
  let query: jest.SpyInstance;
  let store: PgRevocationStore;

  beforeEach(() => {
    const db = new DatabaseService({ driver: 'postgres', databaseUrl: 'postgres://localhost/test', timeoutMs: 1000 });
    query = jest.spyOn(db, 'query');
    store = new PgRevocationStore(db);
  });

  it('wins the revocation when the row is inserted', async () => {
    query.mockResolvedValueOnce(result(1));

    await expect(store.revoke(record)).resolves.toBe(true);
    expect(query.mock.calls[0][0]).toContain('ON CONFLICT (jti) DO NOTHING');
    expect(query.mock.calls[0][1]).toEqual(['jti-1', record.revokedAt, record.expiresAt]);
  });

  it('loses the revocation when the jti was already there', async () => {
    query.mockResolvedValueOnce(result(0));

    await expect(store.revoke(record)).resolves.toBe(false);
  });

  it('counts purged rows', async () => {
    const now = new Date('2026-01-09T00:00:00.000Z');
    query.mockResolvedValueOnce(result(3));

    await expect(store.purgeExpired(now)).resolves.toBe(3);
    expect(query.mock.calls[0][1]).toEqual([now]);
  });
});
