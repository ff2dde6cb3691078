import type { ResourceDefinition } from './interface';

/**
 * Declares a queryable resource. The definition is frozen, so per-request code can never widen an allow-list.
 *
 * @example
 * ```ts
 * export const cities = defineResource({
 *     table: 'cities',
 *     allowedFields: ['id', 'name', 'province_id', 'created_at'],
 *     allowedFilters: ['name', 'province_id'],
 *     allowedSorts: ['name', 'created_at'],
 *     allowedIncludes: ['province', 'province.country'],
 *     columnTypes: { name: ColumnType.STRING, province_id: ColumnType.ID, created_at: ColumnType.DATE },
 *     relationships: { province: belongsTo('provinces', 'province_id') },
 * });
 * ```
 */
export function defineResource<T extends ResourceDefinition>(definition: T): Readonly<T> {
    return Object.freeze(definition);
}

export function resourceName(definition: ResourceDefinition): string {
    return definition.resource ?? definition.table;
}

export function primaryKeyOf(definition: ResourceDefinition): string {
    return definition.primaryKey ?? 'id';
}
