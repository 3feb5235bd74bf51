/**
 * Social Events API - Email Validation
 *
 * Emails key the user email markers and the tickets, so every address is
 * validated and normalized (trimmed, lower-cased) before storage or lookup.
 *
 * @see RFC 5321 Section 4.5.3.1 - Size Limits and Minimums
 */

import { z } from 'zod';

// =============================================================================
// Constants
// =============================================================================

/** Maximum allowed email length per RFC 5321 Section 4.5.3.1.3 */
const MAX_EMAIL_LENGTH = 254;

/** Maximum local part length per RFC 5321 Section 4.5.3.1.1 */
const MAX_LOCAL_PART_LENGTH = 64;

/**
 * Local part: alphanumeric start, then dots, hyphens, underscores, plus signs.
 * Domain: dot-separated labels without leading/trailing hyphens, alphabetic TLD.
 */
const EMAIL_REGEX = /^[a-zA-Z0-9][a-zA-Z0-9._+-]*@[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?)*\.[a-zA-Z]{2,}$/;

// =============================================================================
// Email Validation
// =============================================================================

/**
 * @example
 * ```typescript
 * isValidEmail('a@example.com')     // true
 * isValidEmail('a..b@example.com')  // false
 * ```
 */
export function isValidEmail(email: string): boolean {
    // Length first, the regex never sees oversized input
    if (email.length > MAX_EMAIL_LENGTH) {
        return false;
    }

    const trimmed = email.trim();
    const atIndex = trimmed.lastIndexOf('@');
    if (atIndex <= 0) {
        return false;
    }

    const localPart = trimmed.substring(0, atIndex);
    if (localPart.length > MAX_LOCAL_PART_LENGTH) {
        return false;
    }
    if (localPart.includes('..') || localPart.endsWith('.')) {
        return false;
    }

    return EMAIL_REGEX.test(trimmed);
}

/**
 * @example
 * ```typescript
 * normalizeEmail(' User@Example.COM ') // 'user@example.com'
 * ```
 */
export function normalizeEmail(email: string): string {
    return email.toLowerCase().trim();
}

/**
 * zod schema for an email field: validated, then normalized.
 */
export const emailSchema = z
    .string()
    .refine(isValidEmail, { message: 'Invalid email address' })
    .transform(normalizeEmail);
