import { createSecretKey } from 'node:crypto';

import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { SignJWT, base64url, errors, jwtVerify } from 'jose';

import { CURSOR_ISSUER, CURSOR_TTL_SECONDS } from '../constants';
import { CursorDataDto } from '../dto/cursor-data.dto';
import { CursorExpiredException, InvalidCursorException } from '../exception';

import type { KeyObject } from 'node:crypto';
import type { JWTPayload } from 'jose';
import type { CursorClaims, CursorData } from '../interface';

const ALGORITHM = 'HS256';

export interface CursorCodecOptions {
    secret: string;
    issuer?: string;
    ttlSeconds?: number;
    /**
     * Milliseconds since the epoch. Drives both the cursor timestamps and expiry checks.
     */
    clock?: () => number;
}

/**
 * Signs and verifies opaque pagination cursors (HS256 JWT).
 *
 * ```
 * { cursor: { timestamp, position, per_page }, iat, exp, iss }
 * ```
 */
export class CursorCodec {
    private readonly logger = new Logger(CursorCodec.name);
    private readonly key: KeyObject;
    private readonly issuer: string;
    private readonly ttlSeconds: number;
    private readonly clock: () => number;

    constructor(options: CursorCodecOptions) {
        this.key = createSecretKey(Buffer.from(options.secret, 'utf8'));
        this.issuer = options.issuer ?? CURSOR_ISSUER;
        this.ttlSeconds = options.ttlSeconds ?? CURSOR_TTL_SECONDS;
        this.clock = options.clock ?? Date.now;
    }

    now(): number {
        return this.clock();
    }

    async encode(cursor: CursorData): Promise<string> {
        const issuedAt = Math.floor(this.clock() / 1000);

        return new SignJWT({
            cursor: {
                timestamp: cursor.timestamp,
                position: cursor.position,
                per_page: cursor.perPage,
            },
        })
            .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
            .setIssuedAt(issuedAt)
            .setExpirationTime(issuedAt + this.ttlSeconds)
            .setIssuer(this.issuer)
            .sign(this.key);
    }

    /**
     * Strict decoding.
     * @throws CursorExpiredException when the token is past its expiry
     * @throws InvalidCursorException for anything else that is wrong with it
     */
    async validate(token: string): Promise<CursorData> {
        const payload = await this.verify(token);
        return this.toCursorData(payload);
    }

    /**
     * Lenient decoding: absent, malformed, forged or expired tokens all yield `undefined`.
     */
    async decode(token?: string | null): Promise<CursorData | undefined> {
        if (!token) {
            return undefined;
        }
        try {
            return await this.validate(token);
        } catch (error) {
            this.logger.debug(`Ignoring cursor: ${error instanceof Error ? error.message : String(error)}`);
            return undefined;
        }
    }

    async isValid(token: string): Promise<boolean> {
        return (await this.decode(token)) !== undefined;
    }

    /**
     * Full claims of a valid token, for debugging.
     */
    async inspect(token: string): Promise<CursorClaims> {
        const payload = await this.verify(token);
        const cursor = this.toCursorData(payload);

        return {
            cursor: {
                timestamp: cursor.timestamp,
                position: cursor.position,
                per_page: cursor.perPage,
            },
            iat: payload.iat ?? 0,
            exp: payload.exp ?? 0,
            iss: payload.iss ?? '',
        };
    }

    private async verify(token: string): Promise<JWTPayload> {
        if (!isCanonicalCompact(token)) {
            throw new InvalidCursorException();
        }
        try {
            const { payload } = await jwtVerify(token, this.key, {
                algorithms: [ALGORITHM],
                issuer: this.issuer,
                requiredClaims: ['iat', 'exp'],
                currentDate: new Date(this.clock()),
            });
            return payload;
        } catch (error) {
            if (error instanceof errors.JWTExpired) {
                throw new CursorExpiredException(error);
            }
            throw new InvalidCursorException(error);
        }
    }

    private toCursorData(payload: JWTPayload): CursorData {
        const claim = payload.cursor;
        if (typeof claim !== 'object' || claim === null || Array.isArray(claim)) {
            throw new InvalidCursorException();
        }

        const dto = plainToInstance(CursorDataDto, claim, { excludeExtraneousValues: true });
        const validationErrors = validateSync(dto);
        if (validationErrors.length > 0) {
            throw new InvalidCursorException(validationErrors);
        }

        return { timestamp: dto.timestamp, position: dto.position, perPage: dto.perPage };
    }
}

/**
 * The last character of a base64url segment carries unused low bits, so several
 * spellings decode to the same bytes. Only the one the signer produced is accepted.
 */
function isCanonicalCompact(token: string): boolean {
    const segments = token.split('.');
    if (segments.length !== 3) {
        return false;
    }
    return segments.every((segment) => segment.length > 0 && base64url.encode(base64url.decode(segment)) === segment);
}
