import { Logger } from '@nestjs/common';
import _ from 'lodash';

import { FilterConjunction, FilterOperator, RelationshipKind, SortDirection } from './interface';
import { buildCursorWhere } from './pagination/cursor-where';
import { Pagination } from './pagination/pagination';
import { FilterCompiler } from './provider/filter-compiler';
import { FilterGroupCompiler, andGroup, orGroup, pruneFilterNode } from './provider/filter-group';
import { SortCompiler } from './provider/sort-compiler';
import { isSafeIdentifier, joinFragments, qualify } from './provider/sql-fragment';
import { parseIncludes } from './relationship/include-tree';
import { parentKeyOf } from './relationship/relationship';
import { RelationshipPlanner } from './relationship/relationship-planner';
import { primaryKeyOf, resourceName } from './resource-definition';

import type {
    CursorData,
    FilterGroup,
    FilterNode,
    IncludeNode,
    QueryParams,
    ResourceDefinition,
    SortOperation,
    SqlDialect,
    SqlFragment,
} from './interface';

export interface QueryBuilderOptions {
    dialect?: SqlDialect;
}

export type TrashedMode = 'without' | 'with' | 'only';

interface FilterEntry {
    node: FilterNode;
    conjunction: FilterConjunction;
}

/**
 * Fluent description of one list query against a resource.
 *
 * Every input is checked against the definition's allow-lists as it is added; what is not allowed is dropped
 * and never reaches the SQL.
 */
export class QueryBuilder {
    private readonly logger = new Logger(QueryBuilder.name);
    private readonly filters: FilterEntry[] = [];
    private readonly sorts: SortOperation[] = [];
    private readonly includes: string[] = [];
    private fields?: string[];
    private trashed: TrashedMode = 'without';
    private pagination: Pagination = Pagination.cursor();
    private readonly planner: RelationshipPlanner;

    constructor(
        readonly definition: ResourceDefinition,
        private readonly options: QueryBuilderOptions = {},
    ) {
        if (!isSafeIdentifier(definition.table)) {
            throw new Error(`Invalid table name "${definition.table}"`);
        }
        this.planner = new RelationshipPlanner(definition.table, definition.relationships ?? {}, definition.allowedIncludes, {
            dialect: options.dialect,
        });
    }

    static fromParams(definition: ResourceDefinition, params: QueryParams, options: QueryBuilderOptions = {}): QueryBuilder {
        const builder = new QueryBuilder(definition, options);

        for (const filter of params.filters) {
            builder.where(filter.field, filter.operator, filter.value);
        }
        for (const group of params.filterGroups) {
            builder.whereGroup(group);
        }
        for (const scope of params.scopes) {
            builder.scope(scope.name, ...scope.args);
        }
        for (const sort of params.sorts) {
            builder.orderBy(sort.field, sort.direction);
        }
        builder.include(params.includes);

        const fields = params.fields[resourceName(definition)];
        if (fields) {
            builder.select(fields);
        }

        return builder.paginate(Pagination.fromParams(params));
    }

    where(field: string, operator: FilterOperator, value?: unknown): this {
        return this.addFilter({ field, operator, value }, FilterConjunction.AND);
    }

    /**
     * `a AND b OR c` reads as `(a AND b) OR c`: an OR starts a new run of ANDed conditions.
     */
    orWhere(field: string, operator: FilterOperator, value?: unknown): this {
        return this.addFilter({ field, operator, value }, FilterConjunction.OR);
    }

    whereGroup(group: FilterGroup): this {
        return this.addFilter(group, FilterConjunction.AND);
    }

    orWhereGroup(group: FilterGroup): this {
        return this.addFilter(group, FilterConjunction.OR);
    }

    /**
     * Applies a named scope of the definition. Unknown names are skipped.
     */
    scope(name: string, ...args: string[]): this {
        const scopes = this.definition.scopes ?? {};
        const factory = Object.prototype.hasOwnProperty.call(scopes, name) ? scopes[name] : undefined;
        if (!factory) {
            this.logger.debug(`Scope "${name}" is not defined on ${this.definition.table}, skipping`);
            return this;
        }
        return this.addFilter(factory(...args), FilterConjunction.AND);
    }

    withTrashed(): this {
        this.trashed = 'with';
        return this;
    }

    onlyTrashed(): this {
        this.trashed = 'only';
        return this;
    }

    whereEq(field: string, value: unknown): this {
        return this.where(field, FilterOperator.EQ, value);
    }

    whereNe(field: string, value: unknown): this {
        return this.where(field, FilterOperator.NE, value);
    }

    whereGt(field: string, value: unknown): this {
        return this.where(field, FilterOperator.GT, value);
    }

    whereGte(field: string, value: unknown): this {
        return this.where(field, FilterOperator.GTE, value);
    }

    whereLt(field: string, value: unknown): this {
        return this.where(field, FilterOperator.LT, value);
    }

    whereLte(field: string, value: unknown): this {
        return this.where(field, FilterOperator.LTE, value);
    }

    whereLike(field: string, pattern: string): this {
        return this.where(field, FilterOperator.LIKE, pattern);
    }

    whereContains(field: string, value: string): this {
        return this.where(field, FilterOperator.CONTAINS, value);
    }

    whereIn(field: string, values: readonly unknown[]): this {
        return this.where(field, FilterOperator.IN, [...values]);
    }

    whereNotIn(field: string, values: readonly unknown[]): this {
        return this.where(field, FilterOperator.NOT_IN, [...values]);
    }

    whereBetween(field: string, from: unknown, to: unknown): this {
        return this.where(field, FilterOperator.BETWEEN, [from, to]);
    }

    whereNull(field: string): this {
        return this.where(field, FilterOperator.IS_NULL);
    }

    whereNotNull(field: string): this {
        return this.where(field, FilterOperator.IS_NOT_NULL);
    }

    orderBy(field: string, direction: SortDirection = SortDirection.ASC): this {
        if (!this.definition.allowedSorts.includes(field)) {
            this.logger.debug(`Sort on "${field}" is not allowed on ${this.definition.table}, skipping`);
            return this;
        }
        this.sorts.push({ field, direction });
        return this;
    }

    orderByDesc(field: string): this {
        return this.orderBy(field, SortDirection.DESC);
    }

    include(paths: string | readonly string[]): this {
        const requested = typeof paths === 'string' ? paths.split(',') : paths;
        for (const path of this.planner.validateIncludes(requested)) {
            if (!this.includes.includes(path)) {
                this.includes.push(path);
            }
        }
        return this;
    }

    /**
     * Restricts the selected columns. Names outside `allowedFields` are ignored; nothing left means the default set.
     */
    select(fields: readonly string[]): this {
        const allowed = _.uniq(fields.filter((field) => this.definition.allowedFields.includes(field)));
        this.fields = allowed.length > 0 ? allowed : undefined;
        return this;
    }

    paginate(pagination: Pagination): this {
        this.pagination = pagination;
        return this;
    }

    page(page: number): this {
        return this.paginate(Pagination.pageBased(page, this.pagination.perPage));
    }

    perPage(perPage: number): this {
        return this.paginate(
            this.pagination.isOffset()
                ? Pagination.pageBased(this.pagination.page, perPage)
                : Pagination.cursor(perPage, this.pagination.cursor),
        );
    }

    cursor(token?: string): this {
        return this.paginate(Pagination.cursor(this.pagination.perPage, token));
    }

    getPagination(): Pagination {
        return this.pagination;
    }

    /**
     * Every filter added so far as one tree: runs of ANDed conditions, ORed together when `orWhere` split them.
     */
    getFilters(): FilterGroup {
        const runs: FilterNode[][] = [];
        for (const { node, conjunction } of this.filters) {
            if (runs.length === 0 || conjunction === FilterConjunction.OR) {
                runs.push([node]);
            } else {
                runs[runs.length - 1].push(node);
            }
        }

        if (runs.length <= 1) {
            return andGroup(...(runs[0] ?? []));
        }
        return orGroup(...runs.map((run) => (run.length === 1 ? run[0] : andGroup(...run))));
    }

    getTrashed(): TrashedMode {
        return this.trashed;
    }

    getIncludes(): readonly string[] {
        return this.includes;
    }

    getPlanner(): RelationshipPlanner {
        return this.planner;
    }

    /**
     * Requested sorts, else the definition's default sort, else the primary key ascending.
     */
    getSorts(): SortOperation[] {
        if (this.sorts.length > 0) {
            return [...this.sorts];
        }
        if (this.definition.defaultSort?.length) {
            return [...this.definition.defaultSort];
        }
        return [{ field: primaryKeyOf(this.definition), direction: SortDirection.ASC }];
    }

    /**
     * Includes folded into the primary query as JOINs.
     */
    joinedIncludes(): string[] {
        return parseIncludes(this.includes)
            .filter((node) => node.nested.length === 0 && this.planner.shouldEagerLoad(node.relation))
            .map((node) => node.relation);
    }

    /**
     * Includes loaded by secondary batched queries after the primary query.
     */
    loadedIncludeTree(): IncludeNode[] {
        const joined = this.joinedIncludes();
        return parseIncludes(this.includes).filter((node) => !joined.includes(node.relation));
    }

    /**
     * Selected columns of the resource, plus the keys the secondary lookups need.
     */
    selectedColumns(): string[] {
        const base = this.fields ?? this.definition.defaultFields ?? this.definition.allowedFields;
        const keys = [primaryKeyOf(this.definition)];

        for (const node of this.loadedIncludeTree()) {
            const relationship = this.planner.getRelationship(node.relation);
            if (!relationship) continue;
            keys.push(parentKeyOf(relationship));
            if (relationship.kind === RelationshipKind.MORPH_TO) {
                keys.push(relationship.morphType);
            }
        }

        return _.uniq([...base, ...keys]).filter(isSafeIdentifier);
    }

    whereFragment(cursor?: CursorData): SqlFragment | undefined {
        const { table, columnTypes } = this.definition;
        const groups = new FilterGroupCompiler(new FilterCompiler({ table, columnTypes, dialect: this.options.dialect }));
        const root = this.getFilters();
        const nodes = root.conjunction === FilterConjunction.AND ? root.conditions : [root];
        const fragments = nodes
            .map((node) => groups.compile(node))
            .filter((fragment): fragment is SqlFragment => fragment !== undefined);

        const trashed = this.trashedFragment();
        if (trashed) {
            fragments.push(trashed);
        }

        if (cursor && this.pagination.isCursor()) {
            const seek = buildCursorWhere(cursor, this.getSorts(), {
                idColumn: primaryKeyOf(this.definition),
                table,
                columnTypes,
            });
            if (seek) {
                fragments.push(seek);
            }
        }

        return joinFragments(fragments, 'AND');
    }

    /**
     * The page query: `LIMIT perPage OFFSET n` in offset mode, `LIMIT perPage + 1` after the cursor predicate otherwise.
     */
    buildSelect(cursor?: CursorData): SqlFragment {
        const pagination = this.pagination;
        const window = pagination.isCursor()
            ? `LIMIT ${pagination.fetchLimit()}`
            : `LIMIT ${pagination.limit()} OFFSET ${pagination.offset()}`;
        return this.compose(window, cursor);
    }

    buildSelectAll(): SqlFragment {
        return this.compose();
    }

    buildSelectFirst(): SqlFragment {
        return this.compose('LIMIT 1');
    }

    buildCount(): SqlFragment {
        const where = this.whereFragment();
        const sql = `SELECT COUNT(*) AS total FROM ${this.definition.table}`;
        return {
            sql: where ? `${sql} WHERE ${where.sql}` : sql,
            params: where?.params ?? {},
        };
    }

    private compose(window?: string, cursor?: CursorData): SqlFragment {
        const { table } = this.definition;
        const joined = this.joinedIncludes();

        const columns = [
            ...this.selectedColumns().map((column) => qualify(column, table)),
            ...joined.flatMap((name) => this.planner.buildJoinSelect(name)),
        ];
        const joins = joined
            .map((name) => this.planner.buildJoinClause(name, table))
            .filter((clause): clause is string => clause !== undefined);
        const where = this.whereFragment(cursor);
        const orderBy = new SortCompiler(table).compileAll(this.getSorts());

        const parts = [`SELECT ${columns.join(', ')} FROM ${table}`, ...joins];
        if (where) parts.push(`WHERE ${where.sql}`);
        if (orderBy) parts.push(`ORDER BY ${orderBy}`);
        if (window) parts.push(window);

        return { sql: parts.join(' '), params: where?.params ?? {} };
    }

    private addFilter(node: FilterNode, conjunction: FilterConjunction): this {
        const pruned = pruneFilterNode(
            node,
            (field) => this.definition.allowedFilters.includes(field),
            (field) => this.logger.debug(`Filter on "${field}" is not allowed on ${this.definition.table}, skipping`),
        );
        if (pruned) {
            this.filters.push({ node: pruned, conjunction });
        }
        return this;
    }

    private trashedFragment(): SqlFragment | undefined {
        const column = this.definition.softDeletes;
        if (!column || !isSafeIdentifier(column) || this.trashed === 'with') {
            return undefined;
        }
        const qualified = qualify(column, this.definition.table);
        return { sql: this.trashed === 'only' ? `${qualified} IS NOT NULL` : `${qualified} IS NULL`, params: {} };
    }
}
