import { ColumnType, SortDirection } from '../interface';
import { isSafeIdentifier, qualify } from '../provider/sql-fragment';

import type { ColumnTypeMap, CursorData, SortOperation, SqlFragment } from '../interface';

export const CURSOR_TIMESTAMP_PARAM = 'cursor_ts';
export const CURSOR_POSITION_PARAM = 'cursor_pos';

export interface CursorWhereOptions {
    /**
     * Tie-breaker column for single column sorts. Defaults to `id`.
     */
    idColumn?: string;
    table?: string;
    columnTypes?: ColumnTypeMap;
}

/**
 * Keyset ("seek") predicate resuming a sorted result after the cursor.
 *
 * - one sort column: `(a > :cursor_ts OR (a = :cursor_ts AND id > :cursor_pos))`
 * - several: `(a > :ts) OR (a = :ts AND b > :ts) OR (a = :ts AND b = :ts AND c > :pos)`
 *
 * `<` replaces `>` for descending columns. Exactly two values are bound whatever the number of columns.
 */
export function buildCursorWhere(
    cursor: CursorData,
    sorts: readonly SortOperation[],
    options: CursorWhereOptions = {},
): SqlFragment | undefined {
    const columns = sorts.filter((sort) => isSafeIdentifier(sort.field));
    if (columns.length === 0) {
        return undefined;
    }

    const ts = `:${CURSOR_TIMESTAMP_PARAM}`;
    const pos = `:${CURSOR_POSITION_PARAM}`;
    const params = {
        [CURSOR_TIMESTAMP_PARAM]: timestampValue(cursor.timestamp, columns[0].field, options.columnTypes),
        [CURSOR_POSITION_PARAM]: cursor.position,
    };
    const column = (sort: SortOperation) => qualify(sort.field, options.table);

    if (columns.length === 1) {
        const [sort] = columns;
        const op = seekOperator(sort.direction);
        const idColumn = qualify(options.idColumn ?? 'id', options.table);
        return {
            sql: `(${column(sort)} ${op} ${ts} OR (${column(sort)} = ${ts} AND ${idColumn} ${op} ${pos}))`,
            params,
        };
    }

    const branches = columns.map((sort, index) => {
        const equalities = columns.slice(0, index).map((previous) => `${column(previous)} = ${ts}`);
        const bound = index === columns.length - 1 ? pos : ts;
        return [...equalities, `${column(sort)} ${seekOperator(sort.direction)} ${bound}`].join(' AND ');
    });

    return {
        sql: `(${branches.map((branch) => `(${branch})`).join(' OR ')})`,
        params,
    };
}

function seekOperator(direction: SortDirection): '>' | '<' {
    return direction === SortDirection.DESC ? '<' : '>';
}

function timestampValue(timestamp: number, field: string, columnTypes?: ColumnTypeMap): number | string {
    if (columnTypes?.[field] === ColumnType.DATE) {
        return new Date(timestamp).toISOString();
    }
    return timestamp;
}
