import { DEFAULT_PER_PAGE, MAX_PER_PAGE, MIN_PER_PAGE } from '../constants';
import { PaginationType } from '../interface';
import { buildPageUrl } from './pagination-result';

import type { CursorCodec } from './cursor-codec';
import type { CursorData, PaginationInfo, PaginationResult, QueryParams } from '../interface';

/**
 * Page request of a list query.
 *
 * `perPage` is always within [1, 100] and `page` at least 1, whatever the caller passed.
 */
export class Pagination {
    readonly page: number;
    readonly perPage: number;

    private constructor(
        page: unknown,
        perPage: unknown,
        readonly type: PaginationType,
        readonly cursor?: string,
    ) {
        this.page = Pagination.clampPage(page);
        this.perPage = Pagination.clampPerPage(perPage);
    }

    static cursor(perPage: unknown = DEFAULT_PER_PAGE, cursor?: string): Pagination {
        return new Pagination(1, perPage, PaginationType.CURSOR, cursor || undefined);
    }

    static pageBased(page: unknown = 1, perPage: unknown = DEFAULT_PER_PAGE): Pagination {
        return new Pagination(page, perPage, PaginationType.OFFSET);
    }

    static fromParams(params: Pick<QueryParams, 'page' | 'perPage' | 'paginationType' | 'cursor'>): Pagination {
        return params.paginationType === PaginationType.OFFSET
            ? Pagination.pageBased(params.page, params.perPage)
            : Pagination.cursor(params.perPage, params.cursor);
    }

    /**
     * Non-numeric values become the default of 15.
     */
    static clampPerPage(value: unknown): number {
        const numeric = typeof value === 'string' ? Number(value) : value;
        if (typeof numeric !== 'number' || !Number.isFinite(numeric)) {
            return DEFAULT_PER_PAGE;
        }
        return Math.min(MAX_PER_PAGE, Math.max(MIN_PER_PAGE, Math.trunc(numeric)));
    }

    static clampPage(value: unknown): number {
        const numeric = typeof value === 'string' ? Number(value) : value;
        if (typeof numeric !== 'number' || !Number.isFinite(numeric)) {
            return 1;
        }
        return Math.max(1, Math.trunc(numeric));
    }

    isCursor(): boolean {
        return this.type === PaginationType.CURSOR;
    }

    isOffset(): boolean {
        return this.type === PaginationType.OFFSET;
    }

    offset(): number {
        return this.isOffset() ? (this.page - 1) * this.perPage : 0;
    }

    limit(): number {
        return this.perPage;
    }

    /**
     * Rows to request from the database. Cursor pages ask for one extra row to detect a following page.
     */
    fetchLimit(): number {
        return this.isCursor() ? this.perPage + 1 : this.perPage;
    }

    paginateOffset<T>(data: T[], total: number, path = ''): PaginationResult<T> {
        const totalPages = Math.ceil(total / this.perPage);
        const lastPage = Math.max(totalPages, 1);
        const offset = this.offset();
        const empty = data.length === 0;

        const prevPage = this.page > 1 ? Math.min(this.page - 1, lastPage) : null;
        const nextPage = this.page < totalPages ? this.page + 1 : null;
        const url = (page: number | null) => (page === null ? null : buildPageUrl(path, page, this.perPage));

        const pagination: PaginationInfo = {
            pagination_type: PaginationType.OFFSET,
            current_page: this.page,
            per_page: this.perPage,
            total,
            total_pages: totalPages,
            from: empty ? null : offset + 1,
            to: empty ? null : Math.min(offset + data.length, total),
            has_more_pages: this.page < totalPages,
            prev_page: prevPage,
            next_page: nextPage,
            prev_cursor: null,
            next_cursor: null,
            first_page_url: url(1),
            last_page_url: url(lastPage),
            prev_page_url: url(prevPage),
            next_page_url: url(nextPage),
            path,
        };

        return { data, pagination };
    }

    /**
     * `rows` is the result of a `LIMIT perPage + 1` query. `current` is the decoded cursor of the request, if it had a valid one.
     */
    async paginateCursor<T>(rows: T[], codec: CursorCodec, path = '', current?: CursorData): Promise<PaginationResult<T>> {
        const hasMore = rows.length > this.perPage;
        const data = hasMore ? rows.slice(0, this.perPage) : rows;
        const now = codec.now();

        const nextCursor = hasMore
            ? await codec.encode({ timestamp: now, position: data.length, perPage: this.perPage })
            : null;
        const prevCursor =
            current && data.length > 0
                ? await codec.encode({ timestamp: now - this.perPage * 1000, position: 0, perPage: this.perPage })
                : null;

        const pagination: PaginationInfo = {
            pagination_type: PaginationType.CURSOR,
            current_page: null,
            per_page: this.perPage,
            total: null,
            total_pages: null,
            from: null,
            to: null,
            has_more_pages: hasMore,
            prev_page: null,
            next_page: null,
            prev_cursor: prevCursor,
            next_cursor: nextCursor,
            first_page_url: null,
            last_page_url: null,
            prev_page_url: null,
            next_page_url: null,
            path,
        };

        return { data, pagination };
    }
}
