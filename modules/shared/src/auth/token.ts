/**
 * Social Events API - Access Tokens
 *
 * HS256 JWTs signed with the configured secret. `sub` carries the user id;
 * `iss` and `exp` are verified on every request.
 *
 * @module auth/token
 */

import { SignJWT, errors, jwtVerify } from 'jose';
import type { ApiConfig } from '../config';
import { JwtAlgorithm } from '../constants';
import { ErrorMessages, UnauthorizedError } from '../errors';

type TokenConfig = Pick<ApiConfig, 'jwtSecret' | 'jwtIssuer' | 'accessTokenTtlMinutes'>;

export interface IssuedToken {
    accessToken: string;
    /** Lifetime in seconds */
    expiresIn: number;
}

function signingKey(config: TokenConfig): Uint8Array {
    return new TextEncoder().encode(config.jwtSecret);
}

export async function issueAccessToken(userId: string, config: TokenConfig): Promise<IssuedToken> {
    const expiresIn = config.accessTokenTtlMinutes * 60;
    const accessToken = await new SignJWT({})
        .setProtectedHeader({ alg: JwtAlgorithm, typ: 'JWT' })
        .setSubject(userId)
        .setIssuer(config.jwtIssuer)
        .setIssuedAt()
        .setExpirationTime(`${expiresIn}s`)
        .sign(signingKey(config));

    return { accessToken, expiresIn };
}

/**
 * Verify a token and return its subject.
 *
 * @throws UnauthorizedError on a bad signature, issuer or expiry, or a missing subject
 */
export async function verifyAccessToken(token: string, config: TokenConfig): Promise<string> {
    try {
        const { payload } = await jwtVerify(token, signingKey(config), {
            algorithms: [JwtAlgorithm],
            issuer: config.jwtIssuer,
        });
        if (!payload.sub) {
            throw new UnauthorizedError(ErrorMessages.INVALID_TOKEN);
        }
        return payload.sub;
    } catch (err) {
        if (err instanceof errors.JOSEError) {
            throw new UnauthorizedError(ErrorMessages.INVALID_TOKEN);
        }
        throw err;
    }
}

/**
 * Extract the token of an `Authorization: Bearer <token>` header.
 */
export function extractBearerToken(header: string | undefined): string | null {
    if (!header) {
        return null;
    }
    const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
    return match?.[1] ?? null;
}
