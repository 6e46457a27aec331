import { DatabaseService } from '../../database/database.service';
import { RevocationRecord, RevocationStore } from './revocation.store';

export class PgRevocationStore extends RevocationStore {
  constructor(private readonly db: DatabaseService) {
    super();
  }

  async revoke(record: RevocationRecord): Promise<boolean> {
    const result = await this.db.query(
      `
        INSERT INTO revoked_tokens (jti, revoked_at, expires_at)
        VALUES ($1, $2, $3)
        ON CONFLICT (jti) DO NOTHING
      `,
      [record.jti, record.revokedAt, record.expiresAt],
    );
    return result.rowCount === 1;
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = await this.db.query(`DELETE FROM revoked_tokens WHERE expires_at <= $1`, [now]);
    return result.rowCount ?? 0;
  }
}
