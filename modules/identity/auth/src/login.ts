/**
 * Identity & Auth - Credential Exchange
 *
 * Two entry points share one credential check:
 * - POST /api/auth/login  JSON `{ email, password }`
 * - POST /api/auth/token  OAuth2 password form `username`, `password`
 *
 * Every failure answers the same 401 message; the audit log records the
 * actual reason. A login for an unknown email still pays for one Argon2
 * verification.
 *
 * @module identity/auth/login
 */

import {
    ErrorMessages,
    TokenType,
    UnauthorizedError,
    burnVerification,
    issueAccessToken,
    parseBody,
    readForm,
    storage,
    success,
    validate,
    verifyPassword,
    type ApiResponse,
    type IssuedToken,
    type RequestContext,
} from '@social-api/shared';
import { loginSchema, tokenFormSchema } from './validation';

type LoginMethod = 'json' | 'form';

async function authenticate(
    ctx: RequestContext,
    email: string,
    password: string,
    method: LoginMethod
): Promise<IssuedToken> {
    const user = await storage.getUserByEmail(ctx.db, email);

    if (!user) {
        await burnVerification(password, ctx.config.passwordHashing);
        ctx.audit.loginFailure({ method, email, reason: 'unknown_email' });
        throw new UnauthorizedError(ErrorMessages.INVALID_CREDENTIALS);
    }

    if (!(await verifyPassword(password, user.passwordHash))) {
        ctx.audit.loginFailure({ method, email, reason: 'invalid_password' });
        throw new UnauthorizedError(ErrorMessages.INVALID_CREDENTIALS);
    }

    if (!user.isActive) {
        ctx.audit.loginFailure({ method, email, reason: 'account_inactive' });
        throw new UnauthorizedError(ErrorMessages.INVALID_CREDENTIALS);
    }

    ctx.audit.loginSuccess(user.userId, { method, email });
    return issueAccessToken(user.userId, ctx.config);
}

export async function login(ctx: RequestContext): Promise<ApiResponse> {
    const { email, password } = parseBody(loginSchema, ctx.request);
    const token = await authenticate(ctx, email, password, 'json');

    return success({
        accessToken: token.accessToken,
        tokenType: TokenType,
        expiresIn: token.expiresIn,
    });
}

export async function token(ctx: RequestContext): Promise<ApiResponse> {
    const { username, password } = validate(tokenFormSchema, readForm(ctx.request));
    const issued = await authenticate(ctx, username, password, 'form');

    return success({
        access_token: issued.accessToken,
        token_type: TokenType,
        expires_in: issued.expiresIn,
    });
}
