/**
 * Social Events API - Password Hashing
 *
 * Argon2id via hash-wasm. Only the encoded hash (parameters, salt and
 * digest in one string) is stored, so verification needs nothing else.
 *
 * @module auth/password
 */

import { randomBytes } from 'node:crypto';
import { argon2id, argon2Verify } from 'hash-wasm';
import type { PasswordHashingConfig } from '../config';

/**
 * Argon2id parameters (OWASP recommendations); memory and iterations come
 * from configuration.
 */
const ARGON2_CONFIG = {
    parallelism: 1,
    hashLength: 32,
    outputType: 'encoded',
} as const;

const SALT_BYTES = 16;

export async function hashPassword(password: string, config: PasswordHashingConfig): Promise<string> {
    return argon2id({
        password,
        salt: randomBytes(SALT_BYTES),
        iterations: config.iterations,
        memorySize: config.memorySizeKib,
        ...ARGON2_CONFIG,
    });
}

/**
 * @returns false for a wrong password or an unreadable hash
 */
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
    try {
        return await argon2Verify({ password, hash });
    } catch {
        return false;
    }
}

let dummyHash: Promise<string> | null = null;

/**
 * Verify against a throwaway hash so that a login for an unknown email
 * costs as much as one for a known email. A failed hash is not kept, the
 * next call tries again.
 */
export async function burnVerification(password: string, config: PasswordHashingConfig): Promise<void> {
    if (!dummyHash) {
        dummyHash = hashPassword('not-a-real-password', config).catch((err: unknown) => {
            dummyHash = null;
            throw err;
        });
    }
    await verifyPassword(password, await dummyHash);
}
