export enum PaginationType {
    OFFSET = 'offset',
    CURSOR = 'cursor',
}

/**
 * Resume point carried by a cursor token.
 */
export interface CursorData {
    timestamp: number;
    position: number;
    perPage: number;
}

/**
 * Claims of a signed cursor token. `cursor` keeps the wire (snake_case) names.
 */
export interface CursorClaims {
    cursor: {
        timestamp: number;
        position: number;
        per_page: number;
    };
    iat: number;
    exp: number;
    iss: string;
}

export interface PaginationInfo {
    pagination_type: PaginationType;
    current_page: number | null;
    per_page: number;
    total: number | null;
    total_pages: number | null;
    from: number | null;
    to: number | null;
    has_more_pages: boolean;
    prev_page: number | null;
    next_page: number | null;
    prev_cursor: string | null;
    next_cursor: string | null;
    first_page_url: string | null;
    last_page_url: string | null;
    prev_page_url: string | null;
    next_page_url: string | null;
    path: string;
}

export interface PaginationResult<T> {
    data: T[];
    pagination: PaginationInfo;
}
