import { FilterOperator } from '../interface';
import { andGroup, condition } from './filter-group';

import type { FilterNode, ScopeFactory } from '../interface';

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_RECENT_DAYS = 30;

/**
 * Ready-made scopes for the usual column conventions. Pick the ones a resource supports:
 *
 * ```ts
 * scopes: { active: CommonScopes.active, created_between: CommonScopes.createdBetween }
 * ```
 */
export const CommonScopes = {
    active: (): FilterNode => condition('status', FilterOperator.EQ, 'active'),

    recent: (days?: string): FilterNode => {
        const span = Number.parseInt(days ?? '', 10);
        const window = Number.isFinite(span) && span > 0 ? span : DEFAULT_RECENT_DAYS;
        return condition('created_at', FilterOperator.GTE, new Date(Date.now() - window * DAY_MS).toISOString());
    },

    published: (): FilterNode =>
        andGroup(
            condition('published_at', FilterOperator.IS_NOT_NULL),
            condition('published_at', FilterOperator.LTE, new Date().toISOString()),
        ),

    archived: (): FilterNode => condition('archived_at', FilterOperator.IS_NOT_NULL),

    notDeleted: (): FilterNode => condition('deleted_at', FilterOperator.IS_NULL),

    ownedBy: (userId: string): FilterNode => condition('user_id', FilterOperator.EQ, userId),

    createdBetween: (start: string, end: string): FilterNode =>
        andGroup(condition('created_at', FilterOperator.GTE, start), condition('created_at', FilterOperator.LTE, end)),

    withStatus: (...statuses: string[]): FilterNode => condition('status', FilterOperator.IN, statuses),
} satisfies Record<string, ScopeFactory>;
