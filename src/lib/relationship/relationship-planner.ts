import { Logger } from '@nestjs/common';
import _ from 'lodash';

import { RelationshipKind } from '../interface';
import { FilterCompiler, toText } from '../provider/filter-compiler';
import { isSafeIdentifier, parameterKey, qualify, quoteIdentifier, sqlLiteral } from '../provider/sql-fragment';
import { parseIncludes } from './include-tree';
import { identifiersOf, isToOne, parentKeyOf } from './relationship';

import type {
    EagerLoadQuery,
    IncludeNode,
    MorphToRelationship,
    Relationship,
    RelationshipMap,
    SqlDialect,
    SqlParameters,
    SqlRow,
    SqlRunner,
} from '../interface';

const PIVOT_LOCAL_KEY = 'pivot_local_key';
const THROUGH_LOCAL_KEY = 'through_local_key';
const JOIN_ALIAS_SEPARATOR = '__';

export interface RelationshipPlannerOptions {
    dialect?: SqlDialect;
}

interface ResolvedStep {
    name: string;
    relationship: Relationship;
}

/**
 * Turns validated include paths into JOIN clauses or batched secondary lookups (one round trip per include,
 * keyed by the distinct parent key values) and attaches the related rows to their parents.
 */
export class RelationshipPlanner {
    private readonly logger = new Logger(RelationshipPlanner.name);

    constructor(
        private readonly table: string,
        private readonly relationships: RelationshipMap = {},
        private readonly allowed: readonly string[] = Object.keys(relationships),
        private readonly options: RelationshipPlannerOptions = {},
    ) {}

    allowedIncludes(): string[] {
        return [...this.allowed];
    }

    getRelationship(name: string): Relationship | undefined {
        return Object.prototype.hasOwnProperty.call(this.relationships, name) ? this.relationships[name] : undefined;
    }

    getForeignKey(name: string): string | undefined {
        return this.getRelationship(name)?.foreignKey;
    }

    /**
     * Walks a dotted path through the nested relationship maps.
     */
    resolvePath(path: string): ResolvedStep[] | undefined {
        const steps: ResolvedStep[] = [];
        let relationships: RelationshipMap = this.relationships;

        for (const name of path.split('.')) {
            const relationship = Object.prototype.hasOwnProperty.call(relationships, name) ? relationships[name] : undefined;
            if (!relationship || !isSafeIdentifier(name) || !identifiersOf(relationship).every(isSafeIdentifier)) {
                return undefined;
            }
            steps.push({ name, relationship });
            relationships = relationship.relationships?.() ?? {};
        }

        return steps;
    }

    /**
     * An allowed path also allows its prefixes (`a.b` allows `a`).
     */
    isIncludeAllowed(path: string): boolean {
        const allowed = this.allowed.some((candidate) => candidate === path || candidate.startsWith(`${path}.`));
        return allowed && this.resolvePath(path) !== undefined;
    }

    validateIncludes(paths: readonly string[]): string[] {
        const valid: string[] = [];
        for (const path of _.uniq(paths.map((p) => p.trim()).filter((p) => p.length > 0))) {
            if (this.isIncludeAllowed(path)) {
                valid.push(path);
            } else {
                this.logger.warn(`Include "${path}" is not allowed on ${this.table}, skipping`);
            }
        }
        return valid;
    }

    /**
     * Only to-one direct relationships marked `eager` with an explicit `select` are folded into the primary query.
     */
    shouldEagerLoad(name: string): boolean {
        const relationship = this.getRelationship(name);
        if (!relationship || relationship.eager !== true || !relationship.select?.length) {
            return false;
        }
        return relationship.kind === RelationshipKind.HAS_ONE || relationship.kind === RelationshipKind.BELONGS_TO;
    }

    /**
     * The joined table is aliased by the relationship name, so a table joined to itself stays addressable.
     */
    buildJoinClause(name: string, mainTable: string = this.table): string | undefined {
        const steps = this.resolvePath(name);
        return steps?.length === 1 ? this.joinFor(steps[0].relationship, mainTable, name) : undefined;
    }

    /**
     * `"a.b.c"` → the JOINs of `a` from `mainTable`, then `b` from `a`, then `c` from `a__b`. Each step is aliased
     * by the path leading to it.
     */
    buildJoinPath(path: string, mainTable: string = this.table): string | undefined {
        const steps = this.resolvePath(path);
        if (!steps) {
            return undefined;
        }

        const clauses: string[] = [];
        const names: string[] = [];
        let from = mainTable;
        for (const { name, relationship } of steps) {
            names.push(name);
            const alias = names.join(JOIN_ALIAS_SEPARATOR);
            const clause = this.joinFor(relationship, from, alias);
            if (!clause) {
                return undefined;
            }
            clauses.push(clause);
            from = this.quote(alias);
        }
        return clauses.join(' ');
    }

    /**
     * `"name".col AS "name__col"` for every selected column of a JOIN-folded relationship.
     */
    buildJoinSelect(name: string): string[] {
        const relationship = this.getRelationship(name);
        if (!relationship || !relatedTableOf(relationship) || !isSafeIdentifier(name)) {
            return [];
        }
        const alias = this.quote(name);
        return (relationship.select ?? [])
            .filter((column) => !column.includes('.'))
            .map((column) => `${alias}.${column} AS ${this.quote(`${name}${JOIN_ALIAS_SEPARATOR}${column}`)}`);
    }

    /**
     * Moves `name__col` columns of joined rows into a nested `name` object (`null` when the join matched nothing).
     */
    foldJoinedColumns(rows: SqlRow[], names: readonly string[]): SqlRow[] {
        return rows.map((row) => {
            const folded: SqlRow = { ...row };
            for (const name of names) {
                const prefix = `${name}${JOIN_ALIAS_SEPARATOR}`;
                const nested: SqlRow = {};
                for (const key of Object.keys(row).filter((k) => k.startsWith(prefix))) {
                    nested[key.slice(prefix.length)] = row[key];
                    delete folded[key];
                }
                folded[name] = Object.values(nested).every((value) => _.isNil(value)) ? null : nested;
            }
            return folded;
        });
    }

    /**
     * `nested` names the includes that will be loaded from the related rows; their parent keys are always selected.
     */
    buildEagerLoadQueries(rows: readonly SqlRow[], name: string, nested: readonly IncludeNode[] = []): EagerLoadQuery[] {
        const relationship = this.getRelationship(name);
        if (!relationship || !identifiersOf(relationship).every(isSafeIdentifier)) {
            return [];
        }

        const nestedKeys = keysForNested(relationship, nested);
        if (relationship.kind === RelationshipKind.MORPH_TO) {
            return this.buildMorphToQueries(rows, name, relationship, nestedKeys);
        }

        const keys = distinctValues(rows, parentKeyOf(relationship));
        if (keys.length === 0) {
            return [];
        }

        const base = parameterKey(name);
        const keysParam = `${base}_keys`;
        const table = relationship.relatedTable;
        const params: SqlParameters = { [keysParam]: keys };
        const where: string[] = [];
        let sql: string;
        let matchKey: string;

        switch (relationship.kind) {
            case RelationshipKind.HAS_ONE:
            case RelationshipKind.HAS_MANY:
            case RelationshipKind.MORPH_ONE:
            case RelationshipKind.MORPH_MANY:
                matchKey = relationship.foreignKey;
                sql = `SELECT ${selectList(table, relationship.select, [matchKey, ...nestedKeys])} FROM ${table}`;
                where.push(`${table}.${relationship.foreignKey} IN (:...${keysParam})`);
                if (relationship.kind === RelationshipKind.MORPH_ONE || relationship.kind === RelationshipKind.MORPH_MANY) {
                    where.push(`${table}.${relationship.morphType} = :${base}_morph_type`);
                    params[`${base}_morph_type`] = relationship.morphClass;
                }
                break;
            case RelationshipKind.BELONGS_TO:
                matchKey = relationship.localKey;
                sql = `SELECT ${selectList(table, relationship.select, [matchKey, ...nestedKeys])} FROM ${table}`;
                where.push(`${table}.${relationship.localKey} IN (:...${keysParam})`);
                break;
            case RelationshipKind.BELONGS_TO_MANY:
            case RelationshipKind.MORPH_TO_MANY: {
                const { pivot } = relationship;
                matchKey = PIVOT_LOCAL_KEY;
                sql =
                    `SELECT ${selectList(table, relationship.select, nestedKeys)}, ${pivot.table}.${pivot.foreignPivotKey} AS ${PIVOT_LOCAL_KEY} ` +
                    `FROM ${table} INNER JOIN ${pivot.table} ON ${table}.${relationship.foreignKey} = ${pivot.table}.${pivot.relatedPivotKey}`;
                where.push(`${pivot.table}.${pivot.foreignPivotKey} IN (:...${keysParam})`);
                if (relationship.kind === RelationshipKind.MORPH_TO_MANY) {
                    where.push(`${pivot.table}.${relationship.morphType} = :${base}_morph_type`);
                    params[`${base}_morph_type`] = relationship.morphClass;
                }
                break;
            }
            case RelationshipKind.HAS_ONE_THROUGH:
            case RelationshipKind.HAS_MANY_THROUGH: {
                const { through } = relationship;
                matchKey = THROUGH_LOCAL_KEY;
                sql =
                    `SELECT ${selectList(table, relationship.select, nestedKeys)}, ${through.table}.${through.firstKey} AS ${THROUGH_LOCAL_KEY} ` +
                    `FROM ${table} INNER JOIN ${through.table} ON ${through.table}.${through.secondLocalKey} = ${table}.${relationship.foreignKey}`;
                where.push(`${through.table}.${through.firstKey} IN (:...${keysParam})`);
                break;
            }
            default:
                return [];
        }

        const constrained = this.appendConstraints(where, params, relationship, table, base);
        return [
            {
                relationship: name,
                kind: relationship.kind,
                relatedTable: table,
                localKey: relationship.localKey,
                foreignKey: relationship.foreignKey,
                parentKey: parentKeyOf(relationship),
                matchKey,
                cardinality: isToOne(relationship) ? 'one' : 'many',
                sql: `${sql} WHERE ${constrained.where.join(' AND ')}`,
                params: constrained.params,
            },
        ];
    }

    /**
     * Runs the secondary lookups of `includes` (validated against the allow-list first) and returns copies of
     * `rows` carrying the related rows. Independent paths load concurrently.
     */
    async loadRelationships(
        rows: readonly SqlRow[],
        includes: string | readonly string[],
        runner: SqlRunner,
        signal?: AbortSignal,
    ): Promise<SqlRow[]> {
        const paths = typeof includes === 'string' ? includes.split(',') : includes;
        return this.loadTree(rows, parseIncludes(this.validateIncludes(paths)), runner, signal);
    }

    async loadTree(rows: readonly SqlRow[], nodes: readonly IncludeNode[], runner: SqlRunner, signal?: AbortSignal): Promise<SqlRow[]> {
        const result = rows.map((row) => ({ ...row }));
        if (result.length === 0 || nodes.length === 0) {
            return result;
        }
        await Promise.all(nodes.map((node) => this.loadNode(result, node, runner, signal)));
        return result;
    }

    private async loadNode(rows: SqlRow[], node: IncludeNode, runner: SqlRunner, signal?: AbortSignal): Promise<void> {
        const relationship = this.getRelationship(node.relation);
        if (!relationship) {
            return;
        }

        const empty = () => (isToOne(relationship) ? null : []);
        for (const row of rows) {
            row[node.relation] = empty();
        }

        for (const query of this.buildEagerLoadQueries(rows, node.relation, node.nested)) {
            signal?.throwIfAborted();
            let related = await runner.query(query.sql, query.params);

            if (node.nested.length > 0) {
                const nestedPlanner = new RelationshipPlanner(
                    query.relatedTable,
                    relationship.relationships?.() ?? {},
                    undefined,
                    this.options,
                );
                related = await nestedPlanner.loadTree(related, node.nested, runner, signal);
            }

            this.attach(rows, relationship, query, related);
        }
    }

    private attach(rows: SqlRow[], relationship: Relationship, query: EagerLoadQuery, related: SqlRow[]): void {
        const alias = query.matchKey === PIVOT_LOCAL_KEY || query.matchKey === THROUGH_LOCAL_KEY;
        const byKey = _.groupBy(related, (row) => toText(row[query.matchKey]));

        for (const row of rows) {
            if (query.morphClass !== undefined && relationship.kind === RelationshipKind.MORPH_TO) {
                if (toText(row[relationship.morphType]) !== query.morphClass) continue;
            }
            const key = row[query.parentKey];
            if (_.isNil(key)) continue;

            const matches = (byKey[toText(key)] ?? []).map((match) => (alias ? _.omit(match, query.matchKey) : match));
            row[query.relationship] = query.cardinality === 'one' ? (matches[0] ?? null) : matches;
        }
    }

    private buildMorphToQueries(
        rows: readonly SqlRow[],
        name: string,
        relationship: MorphToRelationship,
        nestedKeys: readonly string[],
    ): EagerLoadQuery[] {
        const base = parameterKey(name);
        const byType = _.groupBy(
            rows.filter((row) => !_.isNil(row[relationship.morphType])),
            (row) => toText(row[relationship.morphType]),
        );
        const queries: EagerLoadQuery[] = [];

        for (const [type, typedRows] of Object.entries(byType)) {
            const table = Object.prototype.hasOwnProperty.call(relationship.targets, type) ? relationship.targets[type] : undefined;
            if (!table) {
                this.logger.debug(`No morph target for ${relationship.morphType} = "${type}" on ${this.table}`);
                continue;
            }
            const keys = distinctValues(typedRows, relationship.foreignKey);
            if (keys.length === 0) continue;

            const typeBase = parameterKey(base, type);
            const keysParam = `${typeBase}_keys`;
            const constrained = this.appendConstraints(
                [`${table}.${relationship.localKey} IN (:...${keysParam})`],
                { [keysParam]: keys },
                relationship,
                table,
                typeBase,
            );

            queries.push({
                relationship: name,
                kind: relationship.kind,
                relatedTable: table,
                localKey: relationship.localKey,
                foreignKey: relationship.foreignKey,
                parentKey: relationship.foreignKey,
                matchKey: relationship.localKey,
                cardinality: 'one',
                morphClass: type,
                sql: `SELECT ${selectList(table, relationship.select, [relationship.localKey, ...nestedKeys])} FROM ${table} WHERE ${constrained.where.join(' AND ')}`,
                params: constrained.params,
            });
        }

        return queries;
    }

    private appendConstraints(
        where: string[],
        params: SqlParameters,
        relationship: Relationship,
        table: string,
        base: string,
    ): { where: string[]; params: SqlParameters } {
        const compiler = new FilterCompiler({ table, dialect: this.options.dialect });
        const fragments = (relationship.constraints ?? []).map((constraint, index) =>
            compiler.compile(constraint.column, constraint.operator, constraint.value, `${base}_c${index}`),
        );

        return {
            where: [...where, ...fragments.map((fragment) => `(${fragment.sql})`)],
            params: fragments.reduce<SqlParameters>((merged, fragment) => ({ ...merged, ...fragment.params }), params),
        };
    }

    private quote(name: string): string {
        return quoteIdentifier(name, this.options.dialect);
    }

    /**
     * `from` is the table or quoted alias the relationship starts at; the related table is joined as `alias`,
     * an intermediate pivot or through table as `alias_pivot` / `alias_through`.
     */
    private joinFor(relationship: Relationship, from: string, alias: string): string | undefined {
        const related = this.quote(alias);
        switch (relationship.kind) {
            case RelationshipKind.HAS_ONE:
            case RelationshipKind.HAS_MANY:
                return (
                    `LEFT JOIN ${relationship.relatedTable} AS ${related} ` +
                    `ON ${related}.${relationship.foreignKey} = ${from}.${relationship.localKey}`
                );
            case RelationshipKind.MORPH_ONE:
            case RelationshipKind.MORPH_MANY:
                return (
                    `LEFT JOIN ${relationship.relatedTable} AS ${related} ` +
                    `ON ${related}.${relationship.foreignKey} = ${from}.${relationship.localKey} ` +
                    `AND ${related}.${relationship.morphType} = ${sqlLiteral(relationship.morphClass)}`
                );
            case RelationshipKind.BELONGS_TO:
                return (
                    `LEFT JOIN ${relationship.relatedTable} AS ${related} ` +
                    `ON ${related}.${relationship.localKey} = ${from}.${relationship.foreignKey}`
                );
            case RelationshipKind.BELONGS_TO_MANY:
            case RelationshipKind.MORPH_TO_MANY: {
                const { pivot } = relationship;
                const pivotRef = this.quote(`${alias}_pivot`);
                const morph =
                    relationship.kind === RelationshipKind.MORPH_TO_MANY
                        ? ` AND ${pivotRef}.${relationship.morphType} = ${sqlLiteral(relationship.morphClass)}`
                        : '';
                return (
                    `LEFT JOIN ${pivot.table} AS ${pivotRef} ON ${pivotRef}.${pivot.foreignPivotKey} = ${from}.${relationship.localKey}${morph} ` +
                    `LEFT JOIN ${relationship.relatedTable} AS ${related} ON ${related}.${relationship.foreignKey} = ${pivotRef}.${pivot.relatedPivotKey}`
                );
            }
            case RelationshipKind.HAS_ONE_THROUGH:
            case RelationshipKind.HAS_MANY_THROUGH: {
                const { through } = relationship;
                const throughRef = this.quote(`${alias}_through`);
                return (
                    `LEFT JOIN ${through.table} AS ${throughRef} ON ${throughRef}.${through.firstKey} = ${from}.${relationship.localKey} ` +
                    `LEFT JOIN ${relationship.relatedTable} AS ${related} ON ${related}.${relationship.foreignKey} = ${throughRef}.${through.secondLocalKey}`
                );
            }
            case RelationshipKind.MORPH_TO:
                return undefined;
        }
    }
}

export function relatedTableOf(relationship: Relationship): string | undefined {
    return relationship.kind === RelationshipKind.MORPH_TO ? undefined : relationship.relatedTable;
}

/**
 * `table.*` without an explicit `select`; otherwise the selection plus the key columns matching and nesting need.
 */
function selectList(table: string, select: readonly string[] | undefined, keys: readonly string[] = []): string {
    if (!select?.length) {
        return `${table}.*`;
    }
    return _.uniq([...select, ...keys])
        .map((column) => qualify(column, table))
        .join(', ');
}

/**
 * Columns of the related rows that nested includes read: their parent keys, and the type column of a `morph_to`.
 */
function keysForNested(relationship: Relationship, nested: readonly IncludeNode[]): string[] {
    if (nested.length === 0) {
        return [];
    }
    const children = relationship.relationships?.() ?? {};
    return nested.flatMap((node) => {
        const child = Object.prototype.hasOwnProperty.call(children, node.relation) ? children[node.relation] : undefined;
        if (!child) {
            return [];
        }
        return child.kind === RelationshipKind.MORPH_TO ? [parentKeyOf(child), child.morphType] : [parentKeyOf(child)];
    });
}

function distinctValues(rows: readonly SqlRow[], column: string): unknown[] {
    const values = rows.map((row) => row[column]).filter((value) => !_.isNil(value));
    return _.uniqBy(values, (value) => toText(value));
}
