import { RevocationRecord, RevocationStore } from './revocation.store';

export class InMemoryRevocationStore extends RevocationStore {
  private readonly records = new Map<string, RevocationRecord>();

  async revoke(record: RevocationRecord): Promise<boolean> {
    if (this.records.has(record.jti)) {
      return false;
    }
    this.records.set(record.jti, { ...record });
    return true;
  }

  async purgeExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const [jti, record] of this.records) {
      if (record.expiresAt.getTime() <= now.getTime()) {
        this.records.delete(jti);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.records.size;
  }
}
