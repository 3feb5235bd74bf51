/**
 * Social Events API - Authentication Module
 *
 * @module auth
 */

export { hashPassword, verifyPassword, burnVerification } from './password';
export { issueAccessToken, verifyAccessToken, extractBearerToken } from './token';
export type { IssuedToken } from './token';
export { resolveCurrentUser } from './current-user';
export { toUserResponse } from './user-view';
export type { UserResponse } from './user-view';
