import { PaginationType } from '../lib/interface';
import { CursorCodec } from '../lib/pagination/cursor-codec';
import { Pagination } from '../lib/pagination/pagination';
import { mapResult, withPath } from '../lib/pagination/pagination-result';

const NOW = 1_700_000_000_000;

const rowsOf = (count: number, start = 1) => Array.from({ length: count }, (_, index) => ({ id: start + index }));

describe('Pagination', () => {
    describe('bounds', () => {
        it('clamps per_page into [1, 100] and page to at least 1', () => {
            expect(Pagination.pageBased(0, 500)).toMatchObject({ page: 1, perPage: 100 });
            expect(Pagination.pageBased(-3, 0)).toMatchObject({ page: 1, perPage: 1 });
        });

        it('uses 15 for a non-numeric per_page', () => {
            expect(Pagination.pageBased('2', 'abc')).toMatchObject({ page: 2, perPage: 15 });
        });

        it('defaults to cursor pages of 15', () => {
            const pagination = Pagination.cursor();

            expect(pagination.isCursor()).toBe(true);
            expect(pagination.perPage).toBe(15);
        });
    });

    it('computes offset and limit', () => {
        const offset = Pagination.pageBased(3, 20);
        expect(offset.offset()).toBe(40);
        expect(offset.limit()).toBe(20);
        expect(offset.fetchLimit()).toBe(20);

        const cursor = Pagination.cursor(20);
        expect(cursor.offset()).toBe(0);
        expect(cursor.fetchLimit()).toBe(21);
    });

    it('follows the requested pagination type', () => {
        expect(Pagination.fromParams({ page: 2, perPage: 10, paginationType: PaginationType.OFFSET }).isOffset()).toBe(true);
        expect(Pagination.fromParams({ page: 2, perPage: 10, paginationType: PaginationType.CURSOR, cursor: 'abc' })).toMatchObject({
            type: PaginationType.CURSOR,
            cursor: 'abc',
        });
    });

    describe('offset results', () => {
        it('describes a middle page', () => {
            const result = Pagination.pageBased(2, 10).paginateOffset(rowsOf(10, 11), 25, '/api/cities');

            expect(result.data).toHaveLength(10);
            expect(result.pagination).toEqual({
                pagination_type: PaginationType.OFFSET,
                current_page: 2,
                per_page: 10,
                total: 25,
                total_pages: 3,
                from: 11,
                to: 20,
                has_more_pages: true,
                prev_page: 1,
                next_page: 3,
                prev_cursor: null,
                next_cursor: null,
                first_page_url: '/api/cities?page=1&per_page=10',
                last_page_url: '/api/cities?page=3&per_page=10',
                prev_page_url: '/api/cities?page=1&per_page=10',
                next_page_url: '/api/cities?page=3&per_page=10',
                path: '/api/cities',
            });
        });

        it('describes the last page', () => {
            const { pagination } = Pagination.pageBased(3, 10).paginateOffset(rowsOf(5, 21), 25);

            expect(pagination).toMatchObject({ from: 21, to: 25, has_more_pages: false, prev_page: 2, next_page: null, next_page_url: null });
        });

        it('keeps page numbers within the last page past the end', () => {
            const { pagination } = Pagination.pageBased(5, 10).paginateOffset([], 25);

            expect(pagination).toMatchObject({ from: null, to: null, prev_page: 3, next_page: null, has_more_pages: false });
        });

        it('describes an empty table', () => {
            const { pagination } = Pagination.pageBased(1, 10).paginateOffset([], 0, '/api/cities');

            expect(pagination).toMatchObject({
                total: 0,
                total_pages: 0,
                prev_page: null,
                next_page: null,
                last_page_url: '/api/cities?page=1&per_page=10',
            });
        });
    });

    describe('cursor results', () => {
        const codec = new CursorCodec({ secret: 'test-secret', clock: () => NOW });

        it('truncates the extra row and issues a next cursor', async () => {
            const result = await Pagination.cursor(10).paginateCursor(rowsOf(11), codec, '/api/cities');

            expect(result.data).toHaveLength(10);
            expect(result.pagination).toMatchObject({
                pagination_type: PaginationType.CURSOR,
                has_more_pages: true,
                prev_cursor: null,
                current_page: null,
                total: null,
                total_pages: null,
                from: null,
                to: null,
                first_page_url: null,
                path: '/api/cities',
            });
            await expect(codec.validate(result.pagination.next_cursor ?? '')).resolves.toEqual({
                timestamp: NOW,
                position: 10,
                perPage: 10,
            });
        });

        it('issues a previous cursor when the request carried one', async () => {
            const current = { timestamp: NOW - 60_000, position: 10, perPage: 10 };
            const result = await Pagination.cursor(10, 'token').paginateCursor(rowsOf(3), codec, '', current);

            expect(result.data).toHaveLength(3);
            expect(result.pagination.has_more_pages).toBe(false);
            expect(result.pagination.next_cursor).toBeNull();
            await expect(codec.validate(result.pagination.prev_cursor ?? '')).resolves.toEqual({
                timestamp: NOW - 10_000,
                position: 0,
                perPage: 10,
            });
        });

        it('issues no previous cursor for an empty page', async () => {
            const current = { timestamp: NOW - 60_000, position: 10, perPage: 10 };
            const result = await Pagination.cursor(10, 'token').paginateCursor([], codec, '', current);

            expect(result.pagination.prev_cursor).toBeNull();
        });
    });

    describe('result helpers', () => {
        it('re-targets offset URLs', () => {
            const result = withPath(Pagination.pageBased(2, 10).paginateOffset(rowsOf(10, 11), 25), '/api/v2/cities');

            expect(result.pagination).toMatchObject({
                path: '/api/v2/cities',
                first_page_url: '/api/v2/cities?page=1&per_page=10',
                last_page_url: '/api/v2/cities?page=3&per_page=10',
                prev_page_url: '/api/v2/cities?page=1&per_page=10',
                next_page_url: '/api/v2/cities?page=3&per_page=10',
            });
        });

        it('only records the path of cursor results', async () => {
            const codec = new CursorCodec({ secret: 'test-secret', clock: () => NOW });
            const result = withPath(await Pagination.cursor(10).paginateCursor(rowsOf(2), codec), '/api/cities');

            expect(result.pagination.path).toBe('/api/cities');
            expect(result.pagination.first_page_url).toBeNull();
        });

        it('maps data and keeps the metadata', () => {
            const result = Pagination.pageBased(1, 10).paginateOffset(rowsOf(2), 2);
            const mapped = mapResult(result, (rows) => rows.map((row) => row.id * 10));

            expect(mapped.data).toEqual([10, 20]);
            expect(mapped.pagination).toBe(result.pagination);
        });
    });
});
