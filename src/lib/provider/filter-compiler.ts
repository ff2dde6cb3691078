import _ from 'lodash';

import { ColumnType, FilterOperator } from '../interface';
import { MATCH_EVERYTHING, MATCH_NOTHING, isSafeIdentifier, parameterKey, qualify, sqlFragment } from './sql-fragment';

import type { ColumnTypeMap, SqlDialect, SqlFragment } from '../interface';

export interface FilterCompilerOptions {
    /**
     * Qualifies every emitted column (`table.column`).
     */
    table?: string;
    columnTypes?: ColumnTypeMap;
    dialect?: SqlDialect;
}

const OPERATOR_ALIASES: Record<string, FilterOperator> = {
    eq: FilterOperator.EQ,
    '=': FilterOperator.EQ,
    ne: FilterOperator.NE,
    neq: FilterOperator.NE,
    '!=': FilterOperator.NE,
    gt: FilterOperator.GT,
    '>': FilterOperator.GT,
    gte: FilterOperator.GTE,
    '>=': FilterOperator.GTE,
    lt: FilterOperator.LT,
    '<': FilterOperator.LT,
    lte: FilterOperator.LTE,
    '<=': FilterOperator.LTE,
    like: FilterOperator.LIKE,
    ilike: FilterOperator.ILIKE,
    contains: FilterOperator.CONTAINS,
    starts_with: FilterOperator.STARTS_WITH,
    start: FilterOperator.STARTS_WITH,
    ends_with: FilterOperator.ENDS_WITH,
    end: FilterOperator.ENDS_WITH,
    in: FilterOperator.IN,
    not_in: FilterOperator.NOT_IN,
    notin: FilterOperator.NOT_IN,
    is_null: FilterOperator.IS_NULL,
    isnull: FilterOperator.IS_NULL,
    null: FilterOperator.IS_NULL,
    is_not_null: FilterOperator.IS_NOT_NULL,
    isnotnull: FilterOperator.IS_NOT_NULL,
    not_null: FilterOperator.IS_NOT_NULL,
    notnull: FilterOperator.IS_NOT_NULL,
    between: FilterOperator.BETWEEN,
};

export function parseFilterOperator(operator: string): FilterOperator | undefined {
    const alias = operator.trim().toLowerCase();
    return Object.prototype.hasOwnProperty.call(OPERATOR_ALIASES, alias) ? OPERATOR_ALIASES[alias] : undefined;
}

const COMPARISON_SQL: Partial<Record<FilterOperator, string>> = {
    [FilterOperator.EQ]: '=',
    [FilterOperator.NE]: '!=',
    [FilterOperator.GT]: '>',
    [FilterOperator.GTE]: '>=',
    [FilterOperator.LT]: '<',
    [FilterOperator.LTE]: '<=',
};

/**
 * Compiles one (column, operator, value) triple into a predicate with bound values.
 *
 * Never throws: values that cannot be used for the column's type degrade to a harmless predicate,
 * and any combination it does not know falls back to `column = '<raw value>'`.
 */
export class FilterCompiler {
    constructor(private readonly options: FilterCompilerOptions = {}) {}

    compile(column: string, operator: FilterOperator, value: unknown, key: string = parameterKey(column, operator)): SqlFragment {
        if (!isSafeIdentifier(column)) {
            return MATCH_NOTHING;
        }
        const target = qualify(column, this.options.table);

        if (operator === FilterOperator.IS_NULL) {
            return sqlFragment(`${target} IS NULL`);
        }
        if (operator === FilterOperator.IS_NOT_NULL) {
            return sqlFragment(`${target} IS NOT NULL`);
        }

        const fragment = this.compileTyped(this.options.columnTypes?.[column], target, operator, value, key);
        return fragment ?? this.compileDefault(target, value, key);
    }

    private compileTyped(
        type: ColumnType | undefined,
        target: string,
        operator: FilterOperator,
        value: unknown,
        key: string,
    ): SqlFragment | undefined {
        switch (type) {
            case ColumnType.NUMBER:
                return this.compileNumber(target, operator, value, key);
            case ColumnType.STRING:
                return this.compileString(target, operator, value, key);
            case ColumnType.DATE:
                return this.compileDate(target, operator, value, key);
            case ColumnType.ID:
                return this.compileId(target, operator, value, key);
            default:
                return undefined;
        }
    }

    private compileNumber(target: string, operator: FilterOperator, value: unknown, key: string): SqlFragment | undefined {
        const comparison = COMPARISON_SQL[operator];
        if (comparison) {
            const numeric = toNumber(value);
            if (numeric === undefined) {
                return sqlFragment(`${target} = 0`);
            }
            return sqlFragment(`${target} ${comparison} :${key}`, { [key]: numeric });
        }

        switch (operator) {
            case FilterOperator.IN:
            case FilterOperator.NOT_IN: {
                const list = toList(value)
                    .map(toNumber)
                    .filter((item): item is number => item !== undefined);
                return this.compileList(target, operator, list, key);
            }
            case FilterOperator.BETWEEN: {
                const range = toRange(value);
                if (!range) {
                    return sqlFragment(`${target} IS NOT NULL`);
                }
                const from = toNumber(range[0]);
                const to = toNumber(range[1]);
                if (from === undefined || to === undefined) {
                    return sqlFragment(`${target} = 0`);
                }
                return this.compileBetween(target, from, to, key);
            }
            default:
                return undefined;
        }
    }

    private compileString(target: string, operator: FilterOperator, value: unknown, key: string): SqlFragment | undefined {
        const comparison = COMPARISON_SQL[operator];
        if (comparison) {
            return sqlFragment(`${target} ${comparison} :${key}`, { [key]: toText(value) });
        }

        switch (operator) {
            case FilterOperator.LIKE:
                return sqlFragment(`${target} LIKE :${key}`, { [key]: toText(value) });
            case FilterOperator.ILIKE:
                return this.compileCaseInsensitiveLike(target, toText(value), key);
            case FilterOperator.CONTAINS:
                return sqlFragment(`LOWER(${target}) LIKE LOWER(:${key})`, { [key]: `%${toText(value)}%` });
            case FilterOperator.STARTS_WITH:
                return sqlFragment(`LOWER(${target}) LIKE LOWER(:${key})`, { [key]: `${toText(value)}%` });
            case FilterOperator.ENDS_WITH:
                return sqlFragment(`LOWER(${target}) LIKE LOWER(:${key})`, { [key]: `%${toText(value)}` });
            case FilterOperator.IN:
            case FilterOperator.NOT_IN:
                return this.compileList(target, operator, toList(value).map(toText), key);
            case FilterOperator.BETWEEN: {
                const range = toRange(value);
                if (!range) {
                    return sqlFragment(`${target} IS NOT NULL`);
                }
                return this.compileBetween(target, toText(range[0]), toText(range[1]), key);
            }
            default:
                return undefined;
        }
    }

    private compileDate(target: string, operator: FilterOperator, value: unknown, key: string): SqlFragment | undefined {
        switch (operator) {
            case FilterOperator.EQ:
            case FilterOperator.NE:
                return sqlFragment(`${target} ${COMPARISON_SQL[operator]} :${key}`, { [key]: toIsoString(value) ?? toText(value) });
            case FilterOperator.GT:
            case FilterOperator.GTE:
            case FilterOperator.LT:
            case FilterOperator.LTE: {
                const iso = toIsoString(value);
                if (iso === undefined) {
                    return sqlFragment(`${target} IS NOT NULL`);
                }
                return sqlFragment(`${target} ${COMPARISON_SQL[operator]} :${key}`, { [key]: iso });
            }
            case FilterOperator.BETWEEN: {
                const range = toRange(value);
                const from = range ? toIsoString(range[0]) : undefined;
                const to = range ? toIsoString(range[1]) : undefined;
                if (from === undefined || to === undefined) {
                    return sqlFragment(`${target} IS NOT NULL`);
                }
                return this.compileBetween(target, from, to, key);
            }
            case FilterOperator.IN:
            case FilterOperator.NOT_IN:
                return this.compileList(
                    target,
                    operator,
                    toList(value).map((item) => toIsoString(item) ?? toText(item)),
                    key,
                );
            default:
                return undefined;
        }
    }

    private compileId(target: string, operator: FilterOperator, value: unknown, key: string): SqlFragment | undefined {
        switch (operator) {
            case FilterOperator.EQ:
            case FilterOperator.NE:
                return sqlFragment(`${target} ${COMPARISON_SQL[operator]} :${key}`, { [key]: toText(value) });
            case FilterOperator.IN:
            case FilterOperator.NOT_IN:
                return this.compileList(target, operator, toList(value).map(toText), key);
            default:
                return undefined;
        }
    }

    private compileList(target: string, operator: FilterOperator, list: Array<string | number>, key: string): SqlFragment {
        if (list.length === 0) {
            return operator === FilterOperator.IN ? MATCH_NOTHING : MATCH_EVERYTHING;
        }
        const keyword = operator === FilterOperator.IN ? 'IN' : 'NOT IN';
        return sqlFragment(`${target} ${keyword} (:...${key})`, { [key]: list });
    }

    private compileBetween(target: string, from: string | number, to: string | number, key: string): SqlFragment {
        const fromKey = `${key}_from`;
        const toKey = `${key}_to`;
        return sqlFragment(`${target} BETWEEN :${fromKey} AND :${toKey}`, { [fromKey]: from, [toKey]: to });
    }

    private compileCaseInsensitiveLike(target: string, pattern: string, key: string): SqlFragment {
        if ((this.options.dialect ?? 'postgres') === 'postgres') {
            return sqlFragment(`${target} ILIKE :${key}`, { [key]: pattern });
        }
        return sqlFragment(`LOWER(${target}) LIKE LOWER(:${key})`, { [key]: pattern });
    }

    private compileDefault(target: string, value: unknown, key: string): SqlFragment {
        return sqlFragment(`${target} = :${key}`, { [key]: toText(value) });
    }
}

/**
 * Raw string form of a request value.
 */
export function toText(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    if (_.isNil(value)) {
        return '';
    }
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
        return String(value);
    }
    return JSON.stringify(value) ?? '';
}

export function toNumber(value: unknown): number | undefined {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === 'string' && value.trim().length > 0) {
        const parsed = Number(value.trim());
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
}

export function toIsoString(value: unknown): string | undefined {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
    }
    if (typeof value !== 'string' && typeof value !== 'number') {
        return undefined;
    }
    if (typeof value === 'string' && value.trim().length === 0) {
        return undefined;
    }
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

function toList(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
}

function toRange(value: unknown): [unknown, unknown] | undefined {
    if (Array.isArray(value) && value.length === 2) {
        return [value[0], value[1]];
    }
    return undefined;
}
