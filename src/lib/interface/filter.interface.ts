export enum FilterOperator {
    // equality
    EQ = 'eq',
    NE = 'ne',

    // range
    GT = 'gt',
    GTE = 'gte',
    LT = 'lt',
    LTE = 'lte',
    BETWEEN = 'between',

    // pattern
    LIKE = 'like',
    ILIKE = 'ilike',
    CONTAINS = 'contains',
    STARTS_WITH = 'starts_with',
    ENDS_WITH = 'ends_with',

    // list
    IN = 'in',
    NOT_IN = 'not_in',

    // null check
    IS_NULL = 'is_null',
    IS_NOT_NULL = 'is_not_null',
}

/**
 * Semantic type of a filterable column. Decides how the raw request value is coerced.
 */
export enum ColumnType {
    STRING = 'string',
    NUMBER = 'number',
    DATE = 'date',
    ID = 'id',
}

export type ColumnTypeMap = Readonly<Record<string, ColumnType>>;

export interface FilterCondition {
    field: string;
    operator: FilterOperator;
    value: unknown;
}

export enum FilterConjunction {
    AND = 'and',
    OR = 'or',
}

/**
 * Conditions joined by a single conjunction. Groups nest, so `(a OR b) AND c` is an AND group holding an OR group.
 */
export interface FilterGroup {
    conjunction: FilterConjunction;
    conditions: FilterNode[];
}

export type FilterNode = FilterCondition | FilterGroup;

/**
 * A named, reusable filter. Request arguments arrive as strings.
 */
export type ScopeFactory = (...args: string[]) => FilterNode;

export interface ScopeRequest {
    name: string;
    args: readonly string[];
}
