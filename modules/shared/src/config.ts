/**
 * Social Events API - Configuration
 *
 * Centralized environment configuration with validation.
 * All values are injected as Lambda environment variables.
 */

import { TokenLifetimeBounds } from './constants';

// =============================================================================
// Types
// =============================================================================

export interface PasswordHashingConfig {
    /** Argon2id memory cost in KiB */
    memorySizeKib: number;
    /** Argon2id time cost */
    iterations: number;
}

export interface ApiConfig {
    /** DynamoDB table holding every entity */
    tableName: string;
    /** AWS region override, SDK default when absent */
    region?: string;
    /** HMAC key for HS256 access tokens */
    jwtSecret: string;
    /** `iss` claim written into and required from access tokens */
    jwtIssuer: string;
    accessTokenTtlMinutes: number;
    /** CORS allow-list, `*` allows any origin */
    allowedOrigins: string[];
    passwordHashing: PasswordHashingConfig;
}

// =============================================================================
// Configuration Defaults
// =============================================================================

const DEFAULTS = {
    JWT_ISSUER: 'social-api',
    ALLOWED_ORIGINS: '*',
    ARGON2_MEMORY_KIB: 65536, // 64 MB
    ARGON2_ITERATIONS: 3,
} as const;

// =============================================================================
// Environment Validation
// =============================================================================

/**
 * Validates that a required environment variable is present.
 * @throws Error if the variable is missing
 */
export function requireEnv(name: string): string {
    const value = process.env[name];
    if (!value) {
        throw new Error(`Missing required environment variable: ${name}`);
    }
    return value;
}

/**
 * Gets an optional environment variable with a default value.
 */
export function optionalEnv(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

/**
 * Gets an optional numeric environment variable with a default value.
 */
export function optionalNumericEnv(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) {
        return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid numeric value for ${name}`);
    }
    return parsed;
}

function parseOrigins(value: string): string[] {
    return value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0);
}

// =============================================================================
// Configuration Loader
// =============================================================================

let configCache: ApiConfig | null = null;

/**
 * Load and cache the API configuration.
 * @throws Error if a required variable is missing or a value is out of range
 */
export function getApiConfig(): ApiConfig {
    if (configCache) {
        return configCache;
    }

    const accessTokenTtlMinutes = optionalNumericEnv(
        'ACCESS_TOKEN_TTL_MINUTES',
        TokenLifetimeBounds.DEFAULT_MINUTES
    );
    if (
        accessTokenTtlMinutes < TokenLifetimeBounds.MIN_MINUTES ||
        accessTokenTtlMinutes > TokenLifetimeBounds.MAX_MINUTES
    ) {
        throw new Error(
            `ACCESS_TOKEN_TTL_MINUTES must be between ${TokenLifetimeBounds.MIN_MINUTES} and ${TokenLifetimeBounds.MAX_MINUTES}`
        );
    }

    configCache = {
        tableName: requireEnv('TABLE_NAME'),
        region: process.env.AWS_REGION || undefined,
        jwtSecret: requireEnv('JWT_SECRET'),
        jwtIssuer: optionalEnv('JWT_ISSUER', DEFAULTS.JWT_ISSUER),
        accessTokenTtlMinutes,
        allowedOrigins: parseOrigins(optionalEnv('ALLOWED_ORIGINS', DEFAULTS.ALLOWED_ORIGINS)),
        passwordHashing: {
            memorySizeKib: optionalNumericEnv('ARGON2_MEMORY_KIB', DEFAULTS.ARGON2_MEMORY_KIB),
            iterations: optionalNumericEnv('ARGON2_ITERATIONS', DEFAULTS.ARGON2_ITERATIONS),
        },
    };

    return configCache;
}

/**
 * Clear the configuration cache (for testing).
 */
export function clearConfigCache(): void {
    configCache = null;
}
