import { BadRequestException, InternalServerErrorException } from '@nestjs/common';

export class InvalidCursorException extends BadRequestException {
    constructor(cause?: unknown) {
        super('Invalid cursor token', { cause });
    }
}

export class CursorExpiredException extends BadRequestException {
    constructor(cause?: unknown) {
        super('Cursor has expired', { cause });
    }
}

/**
 * Raised by the façade when the database round trip fails. The driver error stays available as `cause`.
 */
export class QueryExecutionException extends InternalServerErrorException {
    constructor(resource: string, cause: unknown) {
        super(`Failed to query ${resource}`, { cause });
    }
}
