import type { Driver } from 'typeorm/driver/Driver';
import type { SqlParameters, SqlRow, SqlRunner } from '../interface';

/**
 * The part of a TypeORM `DataSource` the runner needs.
 */
export interface QueryableDataSource {
    driver: Pick<Driver, 'escapeQueryWithParameters'>;
    query(query: string, parameters?: unknown[]): Promise<unknown>;
}

/**
 * Executes named-parameter SQL on a TypeORM connection pool. `:name` and `:...list` placeholders are
 * expanded by the driver into its native form (`$1`, `?`).
 */
export class TypeOrmSqlRunner implements SqlRunner {
    constructor(private readonly dataSource: QueryableDataSource) {}

    async query(sql: string, params: SqlParameters): Promise<SqlRow[]> {
        const [query, parameters] = this.dataSource.driver.escapeQueryWithParameters(sql, params, {});
        const rows = await this.dataSource.query(query, parameters);

        if (!Array.isArray(rows)) {
            return [];
        }
        return rows.filter((row): row is SqlRow => typeof row === 'object' && row !== null);
    }
}
