export interface RevocationRecord {
  jti: string;
  revokedAt: Date;
  /** Copied from the token; the record is garbage once this passes */
  expiresAt: Date;
}

/**
 * Revoked refresh-token identifiers.
 */
export abstract class RevocationStore {
  /**
   * Atomic insert-if-absent.
   * @returns true if this call revoked the jti, false if it was already revoked
   */
  abstract revoke(record: RevocationRecord): Promise<boolean>;

  /**
   * Drop records whose token has expired anyway
   * @returns number of records removed
   */
  abstract purgeExpired(now: Date): Promise<number>;
}
