import { ColumnType, FilterOperator } from '../../lib/interface';
import { CommonScopes } from '../../lib/provider/common-scopes';
import { belongsTo, hasMany } from '../../lib/relationship/relationship';
import { defineResource } from '../../lib/resource-definition';

import type { RelationshipMap } from '../../lib/interface';

export const provinceRelationships = (): RelationshipMap => ({
    country: belongsTo('countries', 'country_id'),
    cities: hasMany('cities', 'province_id', 'id', {
        constraints: [{ column: 'is_active', operator: FilterOperator.EQ, value: true }],
    }),
});

export const countries = defineResource({
    table: 'countries',
    allowedFields: ['id', 'name', 'iso_code', 'created_at'],
    allowedFilters: ['name', 'iso_code'],
    allowedSorts: ['name', 'created_at'],
    allowedIncludes: ['provinces', 'provinces.cities'],
    columnTypes: { id: ColumnType.ID, name: ColumnType.STRING, iso_code: ColumnType.STRING, created_at: ColumnType.DATE },
    relationships: {
        provinces: hasMany('provinces', 'country_id', 'id', { relationships: provinceRelationships }),
    },
});

export const cities = defineResource({
    table: 'cities',
    allowedFields: ['id', 'name', 'population', 'province_id', 'created_at'],
    defaultFields: ['id', 'name'],
    allowedFilters: ['name', 'population', 'province_id', 'created_at'],
    allowedSorts: ['name', 'population', 'created_at', 'id'],
    allowedIncludes: ['province', 'province.country'],
    columnTypes: {
        id: ColumnType.ID,
        name: ColumnType.STRING,
        population: ColumnType.NUMBER,
        province_id: ColumnType.ID,
        created_at: ColumnType.DATE,
    },
    relationships: {
        province: belongsTo('provinces', 'province_id', 'id', { relationships: provinceRelationships }),
    },
});

export const citiesWithJoinedProvince = defineResource({
    ...cities,
    allowedIncludes: ['province'],
    relationships: {
        province: belongsTo('provinces', 'province_id', 'id', { eager: true, select: ['id', 'name'] }),
    },
});

export const articles = defineResource({
    table: 'articles',
    allowedFields: ['id', 'title', 'status', 'user_id', 'created_at', 'deleted_at'],
    defaultFields: ['id', 'title'],
    allowedFilters: ['title', 'status', 'user_id', 'created_at'],
    allowedSorts: ['id', 'created_at'],
    allowedIncludes: [],
    softDeletes: 'deleted_at',
    columnTypes: {
        id: ColumnType.ID,
        title: ColumnType.STRING,
        status: ColumnType.STRING,
        user_id: ColumnType.ID,
        created_at: ColumnType.DATE,
    },
    scopes: {
        active: CommonScopes.active,
        owned_by: CommonScopes.ownedBy,
        created_between: CommonScopes.createdBetween,
        with_status: CommonScopes.withStatus,
        not_deleted: CommonScopes.notDeleted,
    },
});
