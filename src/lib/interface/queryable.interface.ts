import type { ColumnTypeMap, ScopeFactory } from './filter.interface';
import type { RelationshipMap } from './relationship.interface';
import type { SortOperation } from './sort.interface';

export interface Queryable {
    table: string;
    /**
     * Key used by `fields[<resource>]`. Defaults to `table`.
     */
    resource?: string;
    /**
     * Defaults to `id`.
     */
    primaryKey?: string;
    allowedFields: readonly string[];
    /**
     * Selected when the request names no (valid) field. Defaults to `allowedFields`.
     */
    defaultFields?: readonly string[];
    /**
     * Column holding the deletion timestamp. When set, rows where it is not null are hidden unless the query asks
     * for trashed rows.
     */
    softDeletes?: string;
}

export interface Filterable {
    allowedFilters: readonly string[];
    columnTypes?: ColumnTypeMap;
    /**
     * Named filters a request may apply with `scope=`. Their conditions still go through `allowedFilters`.
     */
    scopes?: Readonly<Record<string, ScopeFactory>>;
}

export interface Sortable {
    allowedSorts: readonly string[];
    defaultSort?: readonly SortOperation[];
}

export interface Includable {
    allowedIncludes: readonly string[];
    relationships?: RelationshipMap;
}

export type ResourceDefinition = Queryable & Filterable & Sortable & Includable;
