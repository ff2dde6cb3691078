import { Logger } from '@nestjs/common';

import { CURSOR_ISSUER, CURSOR_TTL_SECONDS, INSECURE_DEFAULT_PAGINATION_SECRET, PAGINATION_SECRET_ENV } from '../constants';

export interface PaginationConfigOptions {
    /**
     * HMAC secret for cursor tokens. Read from `PAGINATION_SECRET` when omitted.
     */
    secret?: string;
    issuer?: string;
    ttlSeconds?: number;
}

export interface PaginationConfig {
    secret: string;
    issuer: string;
    ttlSeconds: number;
    /**
     * True when neither the options nor the environment provided a secret.
     */
    insecureSecret: boolean;
}

const logger = new Logger('PaginationConfig');

/**
 * Resolved once at startup. The environment is read here and nowhere else.
 */
export function resolvePaginationConfig(
    options: PaginationConfigOptions = {},
    env: NodeJS.ProcessEnv = process.env,
): PaginationConfig {
    const secret = options.secret || env[PAGINATION_SECRET_ENV];
    const ttlSeconds = options.ttlSeconds && options.ttlSeconds > 0 ? Math.floor(options.ttlSeconds) : CURSOR_TTL_SECONDS;

    if (!secret) {
        logger.warn(`${PAGINATION_SECRET_ENV} is not set, cursor tokens are signed with the insecure default secret`);
    }

    return Object.freeze({
        secret: secret || INSECURE_DEFAULT_PAGINATION_SECRET,
        issuer: options.issuer || CURSOR_ISSUER,
        ttlSeconds,
        insecureSecret: !secret,
    });
}
