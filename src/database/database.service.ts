import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Pool, QueryResult, QueryResultRow } from 'pg';
import { AuthError, InternalError, UnavailableError, errorMessage } from '../common/errors';
import { withTimeout } from '../common/timeout';
import { StoreConfig, storeConfig } from '../config/store.config';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
]);

/**
 * SQLSTATE or errno code of a pg / socket error, if any
 */
export function pgErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isConnectionFailure(error: unknown): boolean {
  const code = pgErrorCode(error);
  if (code !== undefined) {
    return CONNECTION_ERROR_CODES.has(code);
  }
  // pg reports its own client-side timeouts without a code
  return error instanceof Error && /timeout/i.test(error.message);
}

// SQLSTATE class 23; the stores map these to domain errors
function isConstraintViolation(error: unknown): boolean {
  return pgErrorCode(error)?.startsWith('23') ?? false;
}

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;

  constructor(@Inject(storeConfig.KEY) private readonly config: StoreConfig) {}

  /**
   * Run a parameterized statement on the shared pool
   * @param text - SQL with $n placeholders
   * @param values - Placeholder values
   * @throws UnavailableError on timeout or lost connection
   * @throws InternalError for any other failure except a constraint violation
   */
  async query<R extends QueryResultRow>(text: string, values: unknown[] = []): Promise<QueryResult<R>> {
    try {
      return await withTimeout(
        this.getPool().query<R>(text, values),
        this.config.timeoutMs,
        () => new UnavailableError('Identity store timed out'),
      );
    } catch (error) {
      if (error instanceof AuthError || isConstraintViolation(error)) {
        throw error;
      }
      if (isConnectionFailure(error)) {
        this.logger.error(`Database unreachable: ${errorMessage(error)}`);
        throw new UnavailableError();
      }
      this.logger.error(`Query failed: ${errorMessage(error)}`);
      throw new InternalError();
    }
  }

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.logger.log('Database pool closed');
    }
  }

  protected createPool(connectionString: string): Pool {
    return new Pool({
      connectionString,
      connectionTimeoutMillis: this.config.timeoutMs,
      query_timeout: this.config.timeoutMs,
    });
  }

  private getPool(): Pool {
    if (!this.pool) {
      if (!this.config.databaseUrl) {
        throw new Error('DATABASE_URL is required for the postgres store driver');
      }
      this.pool = this.createPool(this.config.databaseUrl);
      this.pool.on('error', (error) => {
        this.logger.error(`Idle database client error: ${error.message}`);
      });
      this.logger.log('Database pool created');
    }
    return this.pool;
  }
}
