import { PaginationType } from '../interface';

import type { PaginationInfo, PaginationResult } from '../interface';

export function buildPageUrl(path: string, page: number, perPage: number): string {
    return `${path}?page=${page}&per_page=${perPage}`;
}

/**
 * Re-targets the page URLs of an offset result at `path`. Cursor results only record the path.
 */
export function withPath<T>(result: PaginationResult<T>, path: string): PaginationResult<T> {
    const { pagination } = result;
    if (pagination.pagination_type !== PaginationType.OFFSET) {
        return { data: result.data, pagination: { ...pagination, path } };
    }

    const perPage = pagination.per_page;
    const url = (page: number | null): string | null => (page === null ? null : buildPageUrl(path, page, perPage));

    const updated: PaginationInfo = {
        ...pagination,
        path,
        first_page_url: url(1),
        last_page_url: url(Math.max(pagination.total_pages ?? 1, 1)),
        prev_page_url: url(pagination.prev_page),
        next_page_url: url(pagination.next_page),
    };
    return { data: result.data, pagination: updated };
}

/**
 * Transforms the rows, keeping the pagination metadata.
 */
export function mapResult<T, U>(result: PaginationResult<T>, fn: (data: T[]) => U[]): PaginationResult<U> {
    return { data: fn(result.data), pagination: result.pagination };
}
