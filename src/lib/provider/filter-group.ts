import { FilterConjunction } from '../interface';
import { joinFragments, parameterKey } from './sql-fragment';

import type { FilterCondition, FilterGroup, FilterNode, FilterOperator, SqlFragment } from '../interface';
import type { FilterCompiler } from './filter-compiler';

export function isFilterGroup(node: FilterNode): node is FilterGroup {
    return 'conditions' in node;
}

export function condition(field: string, operator: FilterOperator, value?: unknown): FilterCondition {
    return { field, operator, value };
}

export function andGroup(...conditions: FilterNode[]): FilterGroup {
    return { conjunction: FilterConjunction.AND, conditions };
}

export function orGroup(...conditions: FilterNode[]): FilterGroup {
    return { conjunction: FilterConjunction.OR, conditions };
}

/**
 * Keeps the conditions whose field passes `isAllowed`. Groups left empty disappear; a group left with a single
 * member is replaced by it.
 */
export function pruneFilterNode(
    node: FilterNode,
    isAllowed: (field: string) => boolean,
    onDrop: (field: string) => void = () => undefined,
): FilterNode | undefined {
    if (!isFilterGroup(node)) {
        if (isAllowed(node.field)) {
            return node;
        }
        onDrop(node.field);
        return undefined;
    }

    const conditions = node.conditions
        .map((child) => pruneFilterNode(child, isAllowed, onDrop))
        .filter((child): child is FilterNode => child !== undefined);

    if (conditions.length === 0) {
        return undefined;
    }
    return conditions.length === 1 ? conditions[0] : { conjunction: node.conjunction, conditions };
}

/**
 * Compiles a filter tree. Conditions are numbered in the order they are visited, so every placeholder is unique
 * across the whole tree (`name_eq_0`, `name_eq_1`, ...).
 */
export class FilterGroupCompiler {
    private index = 0;

    constructor(private readonly compiler: FilterCompiler) {}

    compile(node: FilterNode): SqlFragment | undefined {
        if (!isFilterGroup(node)) {
            const key = parameterKey(node.field, node.operator, this.index++);
            return this.compiler.compile(node.field, node.operator, node.value, key);
        }

        const fragments = node.conditions
            .map((child) => this.compile(child))
            .filter((fragment): fragment is SqlFragment => fragment !== undefined);
        return joinFragments(fragments, node.conjunction === FilterConjunction.OR ? 'OR' : 'AND');
    }
}
