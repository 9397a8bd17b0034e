import bcrypt from 'bcryptjs';
import { Config } from '../config/config';
import { PolicyError } from '../middleware/error.middleware';
import { logger } from '../utils/logger';

// bcrypt ignores everything past the first 72 bytes of its input
export const BCRYPT_MAX_PASSWORD_BYTES = 72;

export interface PasswordPolicy {
  minLength: number;
  maxBytes: number;
}

export interface HashOptions {
  /** Startup seeding hashes the operator-provided admin password as-is */
  enforcePolicy?: boolean;
}

/**
 * One-way password hashing with bcrypt and the password policy.
 * Every code path that sets a password goes through hash(), so the
 * policy is applied the same way to self-service and admin changes.
 */
export class PasswordService {
  private policy: PasswordPolicy;
  private rounds: number;
  private dummyHash: Promise<string> | null = null;

  constructor(auth: Pick<Config['auth'], 'passwordMinLength' | 'bcryptRounds'>) {
    this.policy = { minLength: auth.passwordMinLength, maxBytes: BCRYPT_MAX_PASSWORD_BYTES };
    this.rounds = auth.bcryptRounds;
  }

  getPolicy(): PasswordPolicy {
    return { ...this.policy };
  }

  private exceedsMaxBytes(password: string): boolean {
    return Buffer.byteLength(password, 'utf8') > this.policy.maxBytes;
  }

  private assertMaxBytes(password: string): void {
    if (this.exceedsMaxBytes(password)) {
      throw new PolicyError(`Password must be at most ${this.policy.maxBytes} bytes long`);
    }
  }

  /**
   * Throws PolicyError when the password is too weak or too long to hash
   */
  assertPolicy(password: string): void {
    if (password.length < this.policy.minLength) {
      throw new PolicyError(
        `Password must be at least ${this.policy.minLength} characters long`
      );
    }
    this.assertMaxBytes(password);
  }

  /**
   * Hash a password with a fresh random salt
   */
  async hash(password: string, options: HashOptions = {}): Promise<string> {
    if (options.enforcePolicy !== false) {
      this.assertPolicy(password);
    } else {
      this.assertMaxBytes(password);
    }
    return bcrypt.hash(password, this.rounds);
  }

  /**
   * Compare a password against a stored hash. Returns false on mismatch and
   * on unusable hashes; never throws. Input longer than any hashable
   * password never matches, even when its first 72 bytes do.
   */
  async verify(password: string, hash: string): Promise<boolean> {
    if (this.exceedsMaxBytes(password)) {
      return false;
    }

    try {
      return await bcrypt.compare(password, hash);
    } catch (error) {
      logger.warn('Password verification failed on stored hash', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return false;
    }
  }

  /**
   * Spend one comparison's worth of work against a throwaway hash.
   * Used when the username is unknown so the response time does not
   * reveal whether the account exists.
   */
  async verifyDummy(password: string): Promise<void> {
    if (!this.dummyHash) {
      this.dummyHash = bcrypt.hash('unused-dummy-password', this.rounds);
    }
    await this.verify(password, await this.dummyHash);
  }
}
