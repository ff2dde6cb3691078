import type { SqlParameters, SqlRow, SqlRunner } from '../../lib/interface';

type Matcher = string | RegExp | ((sql: string) => boolean);

interface Handler {
    matcher: Matcher;
    respond: (params: SqlParameters) => SqlRow[] | Promise<SqlRow[]>;
}

/**
 * In-memory stand-in for a database connection: records every statement and answers from canned rows.
 */
export class FakeSqlRunner implements SqlRunner {
    readonly calls: Array<{ sql: string; params: SqlParameters }> = [];
    private readonly handlers: Handler[] = [];

    on(matcher: Matcher, rows: SqlRow[] | Handler['respond']): this {
        this.handlers.push({ matcher, respond: typeof rows === 'function' ? rows : () => rows });
        return this;
    }

    async query(sql: string, params: SqlParameters): Promise<SqlRow[]> {
        this.calls.push({ sql, params });
        const handler = this.handlers.find(({ matcher }) => matches(matcher, sql));
        return handler ? handler.respond(params) : [];
    }
}

function matches(matcher: Matcher, sql: string): boolean {
    if (typeof matcher === 'string') {
        return sql.includes(matcher);
    }
    if (matcher instanceof RegExp) {
        return matcher.test(sql);
    }
    return matcher(sql);
}
