import { createHash, timingSafeEqual } from 'crypto';

/**
 * Guards admin self-registration behind a configured passphrase.
 * With no passphrase configured, every attempt is refused.
 */
export class AdminGate {
  private readonly digest: Buffer | null;

  constructor(passphrase?: string) {
    this.digest = passphrase ? AdminGate.digestOf(passphrase) : null;
  }

  isEnabled(): boolean {
    return this.digest !== null;
  }

  verify(presented: string | null | undefined): boolean {
    if (!this.digest || !presented) {
      return false;
    }
    // Fixed-length digests keep the comparison constant-time
    return timingSafeEqual(AdminGate.digestOf(presented), this.digest);
  }

  private static digestOf(value: string): Buffer {
    return createHash('sha256').update(value, 'utf8').digest();
  }
}
