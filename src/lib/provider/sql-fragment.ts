import _ from 'lodash';

import type { SqlDialect, SqlFragment, SqlParameters } from '../interface';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;
const PLACEHOLDER = /:(\.\.\.)?([A-Za-z0-9_]+)/g;

export const MATCH_NOTHING: SqlFragment = Object.freeze({ sql: '1 = 0', params: {} });
export const MATCH_EVERYTHING: SqlFragment = Object.freeze({ sql: '1 = 1', params: {} });

/**
 * `name` or `table.name`. Anything else never reaches the SQL text.
 */
export function isSafeIdentifier(name: string): boolean {
    return IDENTIFIER.test(name);
}

export function qualify(column: string, table?: string): string {
    if (!table || column.includes('.')) {
        return column;
    }
    return `${table}.${column}`;
}

/**
 * Quotes an alias so the database keeps its case (`"homeCity"`, or `` `homeCity` `` on mysql).
 * Callers pass names that already passed `isSafeIdentifier`.
 */
export function quoteIdentifier(name: string, dialect: SqlDialect = 'postgres'): string {
    return dialect === 'mysql' ? `\`${name}\`` : `"${name}"`;
}

/**
 * Placeholder names only keep `[A-Za-z0-9_]`.
 */
export function parameterKey(...parts: Array<string | number>): string {
    return parts
        .map((part) => String(part).replace(/[^A-Za-z0-9_]/g, '_'))
        .filter((part) => part.length > 0)
        .join('_');
}

export function sqlFragment(sql: string, params: SqlParameters = {}): SqlFragment {
    return { sql, params };
}

/**
 * Joins fragments with AND / OR, wrapping each operand in parentheses when there is more than one.
 */
export function joinFragments(fragments: SqlFragment[], conjunction: 'AND' | 'OR' = 'AND'): SqlFragment | undefined {
    const parts = fragments.filter((fragment) => fragment.sql.length > 0);
    if (parts.length === 0) {
        return undefined;
    }
    if (parts.length === 1) {
        return parts[0];
    }
    return {
        sql: parts.map((fragment) => `(${fragment.sql})`).join(` ${conjunction} `),
        params: Object.assign({}, ...parts.map((fragment) => fragment.params)),
    };
}

/**
 * Renders a fragment with its values inlined as SQL literals. For logs and debugging only, never for execution.
 */
export function renderSql(fragment: SqlFragment): string {
    return fragment.sql.replace(PLACEHOLDER, (placeholder: string, spread: string | undefined, key: string) => {
        if (!_.has(fragment.params, key)) {
            return placeholder;
        }
        const value = fragment.params[key];
        if (spread && Array.isArray(value)) {
            return value.map(sqlLiteral).join(', ');
        }
        return sqlLiteral(value);
    });
}

export function sqlLiteral(value: unknown): string {
    if (_.isNil(value)) {
        return 'NULL';
    }
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
        return String(value);
    }
    if (value instanceof Date) {
        return quote(value.toISOString());
    }
    if (typeof value === 'string') {
        return quote(value);
    }
    return quote(JSON.stringify(value));
}

function quote(value: string): string {
    return `'${value.replace(/'/g, "''")}'`;
}
