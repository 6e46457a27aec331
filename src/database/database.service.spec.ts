import { Pool, QueryResult } from 'pg';
import { InternalError, UnavailableError } from '../common/errors';
import { StoreConfig } from '../config/store.config';
import { DatabaseService, pgErrorCode } from './database.service';

class StubPoolDatabaseService extends DatabaseService {
  readonly stubPool = new Pool();

  protected createPool(): Pool {
    return this.stubPool;
  }
}

const config: StoreConfig = { driver: 'postgres', databaseUrl: 'postgres://localhost/test', timeoutMs: 20 };

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('DatabaseService', () => {
  let db: StubPoolDatabaseService;

  beforeEach(() => {
    db = new StubPoolDatabaseService(config);
  });

  afterEach(async () => {
    await db.onModuleDestroy();
  });

  it('returns the pool result', async () => {
    const result: QueryResult = { rows: [{ one: 1 }], rowCount: 1, command: 'SELECT', oid: 0, fields: [] };
    const query = jest.spyOn(db.stubPool, 'query').mockImplementation(() => Promise.resolve(result));

    await expect(db.query('SELECT 1 AS one')).resolves.toBe(result);
    expect(query).toHaveBeenCalledWith('SELECT 1 AS one', []);
  });

  it('reports a refused connection as unavailable', async () => {
    jest
      .spyOn(db.stubPool, 'query')
      .mockImplementation(() => Promise.reject(pgError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED')));

    const failure = db.query('SELECT 1');
    await expect(failure).rejects.toThrow(UnavailableError);
    await expect(failure).rejects.toThrow('Identity store is unavailable');
  });

  it('gives up on a query that outlives the timeout', async () => {
    jest.spyOn(db.stubPool, 'query').mockImplementation(() => new Promise<never>(() => undefined));

    await expect(db.query('SELECT pg_sleep(10)')).rejects.toThrow('Identity store timed out');
  });

  it('passes constraint violations through', async () => {
    const violation = pgError('duplicate key value violates unique constraint', '23505');
    jest.spyOn(db.stubPool, 'query').mockImplementation(() => Promise.reject(violation));

    await expect(db.query('INSERT INTO users DEFAULT VALUES')).rejects.toBe(violation);
  });

  it('reports other database errors as internal', async () => {
    jest
      .spyOn(db.stubPool, 'query')
      .mockImplementation(() => Promise.reject(pgError('invalid input syntax for type uuid', '22P02')));

    const failure = db.query('SELECT * FROM users WHERE id = $1', ['not-a-uuid']);
    await expect(failure).rejects.toThrow(InternalError);
    await expect(failure).rejects.toThrow('Internal error');
  });

  it('reports a missing database url as internal', async () => {
    const unconfigured = new DatabaseService({ driver: 'postgres', databaseUrl: null, timeoutMs: 20 });

    await expect(unconfigured.query('SELECT 1')).rejects.toThrow(InternalError);
  });
});

describe('pgErrorCode', () => {
  it('reads the code of pg and socket errors', () => {
    expect(pgErrorCode(pgError('unique', '23505'))).toBe('23505');
    expect(pgErrorCode(new Error('plain'))).toBeUndefined();
    expect(pgErrorCode('23505')).toBeUndefined();
  });
});
