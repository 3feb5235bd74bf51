/**
 * UNIT-06: Password Hashing
 *
 * Argon2id hashes verify only their own password, and the throwaway
 * verification for unknown emails recovers after a failed hash.
 */

import { describe, it, expect } from 'vitest';
import { burnVerification, hashPassword, verifyPassword } from '@social-api/shared';

const CHEAP = { memorySizeKib: 1024, iterations: 1 };

describe('UNIT-06: Password Hashing', () => {
  it('should verify a hash against its own password only', async () => {
    const hash = await hashPassword('test-secret', CHEAP);

    expect(hash.startsWith('$argon2id$')).toBe(true);
    expect(await verifyPassword('test-secret', hash)).toBe(true);
    expect(await verifyPassword('other-secret', hash)).toBe(false);
    expect(await verifyPassword('test-secret', 'not-a-hash')).toBe(false);
  });

  it('should hash the throwaway password again after a failed attempt', async () => {
    await expect(burnVerification('test-secret', { memorySizeKib: 1024, iterations: 0 })).rejects.toThrow(
      /iterations/i
    );

    await expect(burnVerification('test-secret', CHEAP)).resolves.toBeUndefined();
  });
});
