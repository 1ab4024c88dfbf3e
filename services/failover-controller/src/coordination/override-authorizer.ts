/**
 * Override Authorizer
 *
 * Resolves the operator behind an override credential. Keys are held
 * only as SHA-256 digests and compared in constant time.
 */

import { createHash, timingSafeEqual } from 'crypto';
import type { OverrideApiKey } from '@regionguard/config';

export interface OverrideAuthorizer {
  /** Operator name for a valid credential, null otherwise */
  authorize(credential: string): string | null;
}

interface HashedKey {
  operator: string;
  digest: Buffer;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

export class ApiKeyOverrideAuthorizer implements OverrideAuthorizer {
  private readonly keys: readonly HashedKey[];

  constructor(keys: readonly OverrideApiKey[]) {
    this.keys = keys.map(key => ({ operator: key.name, digest: digest(key.key) }));
  }

  authorize(credential: string): string | null {
    if (!credential) {
      return null;
    }
    const presented = digest(credential);
    let operator: string | null = null;

    // Compare against every key so timing does not reveal which one matched
    for (const key of this.keys) {
      if (timingSafeEqual(presented, key.digest) && operator === null) {
        operator = key.operator;
      }
    }
    return operator;
  }

  get size(): number {
    return this.keys.length;
  }
}
