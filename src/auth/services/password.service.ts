import { Inject, Injectable, Logger } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { randomUUID } from 'crypto';
import { ValidationError } from '../../common/errors';
import { AuthConfig, authConfig } from '../../config/auth.config';

/** bcrypt ignores every byte past this many */
export const MAX_PASSWORD_BYTES = 72;

export function exceedsBcryptLimit(password: string): boolean {
  return Buffer.byteLength(password, 'utf8') > MAX_PASSWORD_BYTES;
}

const BCRYPT_HASH = /^\$2[abxy]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export class InvalidHashFormatError extends Error {
  constructor() {
    super('Stored password hash is not a bcrypt hash');
    this.name = 'InvalidHashFormatError';
  }
}

@Injectable()
export class PasswordService {
  private readonly logger = new Logger(PasswordService.name);
  private decoyHash: Promise<string> | null = null;

  constructor(@Inject(authConfig.KEY) private readonly config: AuthConfig) {}

  /**
   * Hash a plaintext password using bcrypt
   * @param password - The plaintext password to hash
   * @returns Promise<string> - The hashed password, salt included
   * @throws ValidationError if the password is longer than bcrypt can tell apart
   */
  async hashPassword(password: string): Promise<string> {
    if (exceedsBcryptLimit(password)) {
      throw new ValidationError(`Password must be at most ${MAX_PASSWORD_BYTES} bytes long`);
    }
    return bcrypt.hash(password, this.config.bcryptRounds);
  }

  /**
   * Verify a plaintext password against a hashed password.
   * A malformed hash counts as a mismatch.
   * @param password - The plaintext password to verify
   * @param hash - The hashed password to compare against
   * @returns Promise<boolean> - True if password matches, false otherwise
   */
  async verifyPassword(password: string, hash: string): Promise<boolean> {
    // No stored hash can come from such a password; its truncation could still match
    if (exceedsBcryptLimit(password)) {
      return false;
    }
    try {
      return await this.compare(password, hash);
    } catch (error) {
      if (error instanceof InvalidHashFormatError) {
        this.logger.warn(error.message);
        return false;
      }
      throw error;
    }
  }

  /**
   * Spend one bcrypt comparison on a throwaway hash, so that an unknown
   * account costs as much time as a wrong password.
   */
  async verifyAgainstDecoy(password: string): Promise<false> {
    this.decoyHash ??= bcrypt.hash(randomUUID(), this.config.bcryptRounds);
    await bcrypt.compare(password, await this.decoyHash);
    return false;
  }

  private async compare(password: string, hash: string): Promise<boolean> {
    if (!BCRYPT_HASH.test(hash)) {
      throw new InvalidHashFormatError();
    }
    return bcrypt.compare(password, hash);
  }
}
