import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import _ from 'lodash';
import qs from 'qs';

import { DEFAULT_PER_PAGE } from '../constants';
import { PaginationQueryDto } from '../dto/pagination-query.dto';
import { FilterConjunction, FilterOperator, PaginationType } from '../interface';
import { parseFilterOperator, toText } from './filter-compiler';
import { SortCompiler } from './sort-compiler';

import type { FilterCondition, FilterGroup, FilterNode, QueryParams, QueryParserOptions, ScopeRequest, SortOperation } from '../interface';

const FLAT_FILTER_KEY = /^filter\[([^\]]+)\](?:\[([^\]]*)\])?$/;
const FLAT_FIELDS_KEY = /^fields\[([^\]]+)\]$/;
const FLAT_SCOPE_KEY = /^scope\[([^\]]+)\]$/;

const GROUP_KEYS: Readonly<Record<string, FilterConjunction>> = { and: FilterConjunction.AND, or: FilterConjunction.OR };

const LIST_OPERATORS: readonly FilterOperator[] = [FilterOperator.IN, FilterOperator.NOT_IN, FilterOperator.BETWEEN];

/**
 * Reads `filter[...]`, `scope`, `sort`, `include`, `fields[...]` and the pagination parameters of a list request.
 *
 * Accepts both the flat keys of a raw query string (`filter[age][gte]`) and the nested objects `qs` produces.
 * Filter groups (`filter[or][0][field]=...&filter[or][0][op]=...&filter[or][0][value]=...`) are only read from
 * the nested form.
 * Nothing is checked against a resource here, that happens when the parameters meet a definition.
 */
export class QueryParser {
    constructor(private readonly options: QueryParserOptions = {}) {}

    /**
     * Parses a raw query string (`?filter[name][eq]=x&sort=-id`) the way express' `qs` parser would.
     */
    parseQueryString(search: string): QueryParams {
        return this.parse(qs.parse(search, { ignoreQueryPrefix: true }));
    }

    parse(query: Record<string, unknown>): QueryParams {
        const pagination = this.parsePagination(query);

        return Object.freeze({
            filters: Object.freeze(this.parseFilters(query)),
            filterGroups: Object.freeze(this.parseFilterGroups(query)),
            scopes: Object.freeze(this.parseScopes(query)),
            sorts: Object.freeze(this.parseSorts(query)),
            includes: Object.freeze(this.parseIncludes(query)),
            fields: Object.freeze(this.parseFields(query)),
            page: pagination.page ?? 1,
            perPage: pagination.perPage ?? this.options.defaultPerPage ?? DEFAULT_PER_PAGE,
            paginationType: pagination.paginationType ?? this.options.defaultPaginationType ?? PaginationType.CURSOR,
            ...(pagination.cursor ? { cursor: pagination.cursor } : {}),
        });
    }

    private parseFilters(query: Record<string, unknown>): FilterCondition[] {
        const filters: FilterCondition[] = [];

        for (const [key, value] of Object.entries(query)) {
            const match = FLAT_FILTER_KEY.exec(key);
            if (match && !isGroupKey(match[1])) {
                filters.push(this.createFilterCondition(match[1], match[2], value));
            }
        }

        const nested = query.filter;
        if (isRecord(nested) && !Array.isArray(nested)) {
            for (const [field, value] of Object.entries(nested)) {
                if (isGroupKey(field)) continue;
                if (isRecord(value) && !Array.isArray(value)) {
                    for (const [operator, operand] of Object.entries(value)) {
                        filters.push(this.createFilterCondition(field, operator, operand));
                    }
                } else {
                    filters.push(this.createFilterCondition(field, undefined, value));
                }
            }
        }

        return filters;
    }

    private parseFilterGroups(query: Record<string, unknown>): FilterGroup[] {
        const nested = query.filter;
        if (!isRecord(nested) || Array.isArray(nested)) {
            return [];
        }
        return Object.entries(GROUP_KEYS)
            .map(([key, conjunction]) => this.parseFilterGroup(conjunction, nested[key]))
            .filter((group): group is FilterGroup => group !== undefined);
    }

    /**
     * Entries are `{field, op, value}` triples or further `{and: [...]}` / `{or: [...]}` groups. A missing `op` means
     * equality; an entry with an unknown `op` or no field is dropped.
     */
    private parseFilterGroup(conjunction: FilterConjunction, entries: unknown): FilterGroup | undefined {
        const items = Array.isArray(entries) ? entries : isRecord(entries) ? Object.values(entries) : [];
        const conditions: FilterNode[] = [];

        for (const item of items) {
            if (!isRecord(item) || Array.isArray(item)) continue;

            const nestedGroups = Object.entries(GROUP_KEYS)
                .filter(([key]) => key in item)
                .map(([key, nestedConjunction]) => this.parseFilterGroup(nestedConjunction, item[key]))
                .filter((group): group is FilterGroup => group !== undefined);
            if (nestedGroups.length > 0) {
                conditions.push(...nestedGroups);
                continue;
            }

            const field = toText(item.field).trim();
            const op = item.op ?? item.operator;
            const operator = _.isNil(op) ? FilterOperator.EQ : parseFilterOperator(toText(op));
            if (field.length === 0 || !operator) continue;

            conditions.push({ field, operator, value: this.processFilterValue(operator, item.value) });
        }

        return conditions.length > 0 ? { conjunction, conditions } : undefined;
    }

    /**
     * `scope=active,recent` applies scopes without arguments; `scope[created_between]=2024-01-01,2024-02-01` passes
     * the comma-separated arguments.
     */
    private parseScopes(query: Record<string, unknown>): ScopeRequest[] {
        const scopes: ScopeRequest[] = [];
        const add = (name: string, args: string[]) => {
            const trimmed = name.trim();
            if (trimmed.length > 0) {
                scopes.push({ name: trimmed, args: Object.freeze(args) });
            }
        };

        for (const [key, value] of Object.entries(query)) {
            const match = FLAT_SCOPE_KEY.exec(key);
            if (match) {
                add(match[1], splitArguments(value));
            }
        }

        const scope = query.scope;
        if (isRecord(scope) && !Array.isArray(scope)) {
            for (const [name, value] of Object.entries(scope)) {
                add(name, splitArguments(value));
            }
        } else if (!_.isNil(scope)) {
            for (const name of splitList(scope)) {
                add(name, []);
            }
        }

        return scopes;
    }

    private createFilterCondition(field: string, operatorStr: string | undefined, value: unknown): FilterCondition {
        // Missing or unknown operator means equality
        const operator = (operatorStr && parseFilterOperator(operatorStr)) || FilterOperator.EQ;

        return {
            field: field.trim(),
            operator,
            value: this.processFilterValue(operator, value),
        };
    }

    private processFilterValue(operator: FilterOperator, value: unknown): unknown {
        if (!LIST_OPERATORS.includes(operator)) {
            return value;
        }
        if (Array.isArray(value)) {
            return value;
        }
        if (typeof value === 'string') {
            return value
                .split(',')
                .map((v) => v.trim())
                .filter((v) => v.length > 0);
        }
        return value;
    }

    private parseSorts(query: Record<string, unknown>): SortOperation[] {
        const sortParam = query.sort;
        if (!sortParam) {
            return [];
        }
        return SortCompiler.parse(toText(sortParam));
    }

    private parseIncludes(query: Record<string, unknown>): string[] {
        const includeParam = query.include;
        if (!includeParam) {
            return [];
        }
        return _.uniq(
            splitList(includeParam)
                .map((include) => include.trim())
                .filter((include) => include.length > 0),
        );
    }

    private parseFields(query: Record<string, unknown>): Record<string, readonly string[]> {
        const fields: Record<string, readonly string[]> = {};

        for (const [key, value] of Object.entries(query)) {
            const match = FLAT_FIELDS_KEY.exec(key);
            if (match) {
                fields[match[1]] = Object.freeze(splitFieldList(value));
            }
        }

        const nested = query.fields;
        if (isRecord(nested) && !Array.isArray(nested)) {
            for (const [resource, value] of Object.entries(nested)) {
                fields[resource] = Object.freeze(splitFieldList(value));
            }
        }

        return fields;
    }

    /**
     * Scalars that fail validation fall back to their defaults instead of failing the request.
     */
    private parsePagination(query: Record<string, unknown>): PaginationQueryDto {
        const dto = plainToInstance(
            PaginationQueryDto,
            _.pick(query, ['page', 'per_page', 'pagination_type', 'cursor']),
            { excludeExtraneousValues: true },
        );

        for (const error of validateSync(dto)) {
            if (error.property in dto) {
                _.unset(dto, error.property);
            }
        }

        return dto;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function splitList(value: unknown): string[] {
    if (Array.isArray(value)) {
        return value.flatMap((item) => splitList(item));
    }
    return toText(value).split(',');
}

function isGroupKey(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(GROUP_KEYS, key);
}

function splitArguments(value: unknown): string[] {
    return splitList(value)
        .map((arg) => arg.trim())
        .filter((arg) => arg.length > 0);
}

function splitFieldList(value: unknown): string[] {
    return _.uniq(
        splitList(value)
            .map((field) => field.trim())
            .filter((field) => field.length > 0),
    );
}
