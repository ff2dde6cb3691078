export type SqlParameters = Record<string, unknown>;

/**
 * SQL text with TypeORM style named placeholders (`:name`, `:...list`) and the values bound to them.
 */
export interface SqlFragment {
    sql: string;
    params: SqlParameters;
}

export type SqlDialect = 'postgres' | 'mysql' | 'sqlite';

export type SqlRow = Record<string, unknown>;

/**
 * The only suspension point of the engine: one round trip on a pooled connection.
 */
export interface SqlRunner {
    query(sql: string, params: SqlParameters): Promise<SqlRow[]>;
}
