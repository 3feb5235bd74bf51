/**
 * Identity & Auth - Lambda Handler
 *
 * Endpoints:
 * - POST /api/auth/register - Create an account
 * - POST /api/auth/login    - Exchange credentials for an access token
 * - POST /api/auth/token    - Same exchange as an OAuth2 password form
 *
 * DynamoDB Key Patterns:
 * - User:         PK=USER#<id>     SK=PROFILE
 * - Email marker: PK=EMAIL#<email> SK=USER
 *
 * @module identity/auth
 */

import { createHandler, publicRoute } from '@social-api/shared';
import { login, token } from './login';
import { register } from './register';

export const handler = createHandler('auth', {
    'POST /api/auth/register': publicRoute(register),
    'POST /api/auth/login': publicRoute(login),
    'POST /api/auth/token': publicRoute(token),
});
