import { HttpException, Logger } from '@nestjs/common';

import { QueryExecutionException } from './exception';
import { CursorCodec } from './pagination/cursor-codec';
import { resolvePaginationConfig } from './pagination/pagination.config';
import { toNumber } from './provider/filter-compiler';
import { QueryParser } from './provider/query-parser';
import { renderSql } from './provider/sql-fragment';
import { QueryBuilder } from './query-builder';
import { resourceName } from './resource-definition';

import type { PaginationConfigOptions } from './pagination/pagination.config';
import type { PaginationResult, QueryParserOptions, ResourceDefinition, SqlDialect, SqlFragment, SqlRow, SqlRunner } from './interface';

export interface QueryBuilderServiceOptions extends QueryParserOptions {
    dialect?: SqlDialect;
}

export interface ExecuteOptions {
    /**
     * Base path of the page URLs in offset results.
     */
    path?: string;
    signal?: AbortSignal;
}

/**
 * Runs list queries for one resource: parse, validate, compile, execute, load includes, paginate.
 */
export class QueryBuilderService {
    private readonly logger = new Logger(QueryBuilderService.name);
    private readonly parser: QueryParser;

    constructor(
        readonly definition: ResourceDefinition,
        private readonly runner: SqlRunner,
        private readonly codec: CursorCodec,
        private readonly options: QueryBuilderServiceOptions = {},
    ) {
        this.parser = new QueryParser({
            defaultPerPage: options.defaultPerPage,
            defaultPaginationType: options.defaultPaginationType,
        });
    }

    query(): QueryBuilder {
        return new QueryBuilder(this.definition, { dialect: this.options.dialect });
    }

    fromQuery(rawQuery: string | Record<string, unknown>): QueryBuilder {
        const params = typeof rawQuery === 'string' ? this.parser.parseQueryString(rawQuery) : this.parser.parse(rawQuery);
        return QueryBuilder.fromParams(this.definition, params, { dialect: this.options.dialect });
    }

    /**
     * Handles a list request straight from its query string, raw or already parsed (`req.query`).
     */
    async index(rawQuery: string | Record<string, unknown>, options: ExecuteOptions = {}): Promise<PaginationResult<SqlRow>> {
        return this.execute(this.fromQuery(rawQuery), options);
    }

    async execute(builder: QueryBuilder, options: ExecuteOptions = {}): Promise<PaginationResult<SqlRow>> {
        const { path = '', signal } = options;
        const pagination = builder.getPagination();

        if (pagination.isOffset()) {
            const total = await this.count(builder, signal);
            const rows = await this.run(builder.buildSelect(), signal);
            const data = await this.loadIncludes(builder, rows, signal);
            return pagination.paginateOffset(data, total, path);
        }

        const cursor = await this.codec.decode(pagination.cursor);
        const rows = await this.run(builder.buildSelect(cursor), signal);
        const result = await pagination.paginateCursor(rows, this.codec, path, cursor);
        const data = await this.loadIncludes(builder, result.data, signal);
        return { data, pagination: result.pagination };
    }

    /**
     * Every matching row, without pagination.
     */
    async all(builder: QueryBuilder = this.query(), signal?: AbortSignal): Promise<SqlRow[]> {
        const rows = await this.run(builder.buildSelectAll(), signal);
        return this.loadIncludes(builder, rows, signal);
    }

    async first(builder: QueryBuilder = this.query(), signal?: AbortSignal): Promise<SqlRow | undefined> {
        const rows = await this.run(builder.buildSelectFirst(), signal);
        const [row] = await this.loadIncludes(builder, rows, signal);
        return row;
    }

    async count(builder: QueryBuilder = this.query(), signal?: AbortSignal): Promise<number> {
        const [row] = await this.run(builder.buildCount(), signal);
        return toNumber(row?.total) ?? 0;
    }

    private async loadIncludes(builder: QueryBuilder, rows: SqlRow[], signal?: AbortSignal): Promise<SqlRow[]> {
        const planner = builder.getPlanner();
        const joined = builder.joinedIncludes();
        const folded = joined.length > 0 ? planner.foldJoinedColumns(rows, joined) : rows;

        const tree = builder.loadedIncludeTree();
        if (tree.length === 0) {
            return folded;
        }

        const runner: SqlRunner = { query: (sql, params) => this.run({ sql, params }, signal) };
        return planner.loadTree(folded, tree, runner, signal);
    }

    private async run(fragment: SqlFragment, signal?: AbortSignal): Promise<SqlRow[]> {
        signal?.throwIfAborted();
        this.logger.debug(renderSql(fragment));

        try {
            return await this.runner.query(fragment.sql, fragment.params);
        } catch (error) {
            if (error instanceof HttpException || signal?.aborted) {
                throw error;
            }
            const resource = resourceName(this.definition);
            this.logger.error(`Query on ${resource} failed: ${error instanceof Error ? error.message : String(error)}`);
            throw new QueryExecutionException(resource, error);
        }
    }
}

export interface CreateQueryBuilderServiceOptions extends QueryBuilderServiceOptions {
    codec?: CursorCodec;
    pagination?: PaginationConfigOptions;
}

/**
 * One service per resource definition, sharing a codec when given one.
 */
export function createQueryBuilderService(
    definition: ResourceDefinition,
    runner: SqlRunner,
    options: CreateQueryBuilderServiceOptions = {},
): QueryBuilderService {
    const { codec, pagination, ...serviceOptions } = options;
    return new QueryBuilderService(definition, runner, codec ?? new CursorCodec(resolvePaginationConfig(pagination)), serviceOptions);
}
