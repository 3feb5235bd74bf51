/**
 * Identity & Auth - Users Lambda Handler
 *
 * Endpoints (all require a Bearer token):
 * - GET   /api/users/me       - Current user
 * - PATCH /api/users/me       - Update the current user's profile
 * - GET   /api/users/{userId} - Any user's public profile
 *
 * @module identity/users
 */

import { authenticatedRoute, createHandler } from '@social-api/shared';
import { getMe, getUserById, updateMe } from './profile';

export const handler = createHandler('users', {
    'GET /api/users/me': authenticatedRoute(getMe),
    'PATCH /api/users/me': authenticatedRoute(updateMe),
    'GET /api/users/{userId}': authenticatedRoute(getUserById),
});
