import type { FilterCondition, FilterGroup, ScopeRequest } from './filter.interface';
import type { PaginationType } from './pagination.interface';
import type { SortOperation } from './sort.interface';

/**
 * Parsed request parameters. Created once per request and never mutated.
 */
export interface QueryParams {
    readonly filters: readonly FilterCondition[];
    /**
     * `filter[and][i][...]` and `filter[or][i][...]`, each ANDed with the plain filters.
     */
    readonly filterGroups: readonly FilterGroup[];
    readonly scopes: readonly ScopeRequest[];
    readonly sorts: readonly SortOperation[];
    readonly includes: readonly string[];
    readonly fields: Readonly<Record<string, readonly string[]>>;
    readonly page: number;
    readonly perPage: number;
    readonly paginationType: PaginationType;
    readonly cursor?: string;
}

export interface QueryParserOptions {
    defaultPerPage?: number;
    defaultPaginationType?: PaginationType;
}
