import bcrypt from 'bcryptjs';
import { createHash, timingSafeEqual } from 'crypto';
import type { PasswordHashingConfig } from '../config/schema.js';

// ============================================================================
// Password Hashing
// ============================================================================

/**
 * One-way password digest. Stores treat the digest as opaque text.
 */
export interface PasswordHasher {
  /** Produce a digest for storage */
  hash(password: string): Promise<string>;
  /** Check a password against a stored digest */
  verify(password: string, digest: string): Promise<boolean>;
  /** True when the digest was made by an older or weaker scheme */
  needsRehash(digest: string): boolean;
}

const BCRYPT_DIGEST = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;
const LEGACY_SHA256 = /^[0-9a-f]{64}$/;
const DEFAULT_ROUNDS = 12;

function sha256Hex(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

function equalHex(a: string, b: string): boolean {
  const left = Buffer.from(a, 'hex');
  const right = Buffer.from(b, 'hex');
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Salted bcrypt digests (`$2b$<rounds>$...`).
 *
 * Also verifies unsalted SHA-256 hex digests written by earlier versions of
 * the application, so those accounts can still sign in and be rehashed.
 */
export class BcryptPasswordHasher implements PasswordHasher {
  private readonly rounds: number;

  constructor(options: Partial<Omit<PasswordHashingConfig, 'algorithm'>> = {}) {
    this.rounds = options.rounds ?? DEFAULT_ROUNDS;
  }

  async hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  async verify(password: string, digest: string): Promise<boolean> {
    if (LEGACY_SHA256.test(digest)) {
      return equalHex(sha256Hex(password), digest);
    }
    if (!BCRYPT_DIGEST.test(digest)) {
      return false;
    }
    return bcrypt.compare(password, digest);
  }

  needsRehash(digest: string): boolean {
    return !BCRYPT_DIGEST.test(digest) || bcrypt.getRounds(digest) !== this.rounds;
  }
}

/**
 * Unsalted single-round SHA-256, as written by earlier versions of the
 * application. Rejected by configuration in production.
 */
export class Sha256PasswordHasher implements PasswordHasher {
  async hash(password: string): Promise<string> {
    return sha256Hex(password);
  }

  async verify(password: string, digest: string): Promise<boolean> {
    return LEGACY_SHA256.test(digest) && equalHex(sha256Hex(password), digest);
  }

  needsRehash(digest: string): boolean {
    return !LEGACY_SHA256.test(digest);
  }
}

/**
 * Create a password hasher based on configuration
 */
export function createPasswordHasher(config: Partial<PasswordHashingConfig> = {}): PasswordHasher {
  const algorithm = config.algorithm ?? 'bcrypt';
  switch (algorithm) {
    case 'bcrypt':
      return new BcryptPasswordHasher(config);
    case 'sha256':
      return new Sha256PasswordHasher();
    default:
      throw new Error(`Unknown password hashing algorithm: ${String(algorithm)}`);
  }
}
