import { RelationshipKind } from '../interface';

import type {
    BelongsToManyRelationship,
    DirectRelationship,
    MorphManyRelationship,
    MorphToManyRelationship,
    MorphToRelationship,
    PivotTable,
    Relationship,
    RelationshipOptions,
    ThroughRelationship,
    ThroughTable,
} from '../interface';

/**
 * `relatedTable.foreignKey` references `parent.localKey`.
 */
export function hasOne(relatedTable: string, foreignKey: string, localKey = 'id', options: RelationshipOptions = {}): DirectRelationship {
    return { kind: RelationshipKind.HAS_ONE, relatedTable, foreignKey, localKey, ...options };
}

export function hasMany(relatedTable: string, foreignKey: string, localKey = 'id', options: RelationshipOptions = {}): DirectRelationship {
    return { kind: RelationshipKind.HAS_MANY, relatedTable, foreignKey, localKey, ...options };
}

/**
 * `parent.foreignKey` references `relatedTable.ownerKey`.
 */
export function belongsTo(relatedTable: string, foreignKey: string, ownerKey = 'id', options: RelationshipOptions = {}): DirectRelationship {
    return { kind: RelationshipKind.BELONGS_TO, relatedTable, foreignKey, localKey: ownerKey, ...options };
}

export interface PivotKeyOptions {
    /** key of the related table referenced by `pivot.relatedPivotKey` */
    relatedKey?: string;
    /** key of the parent table referenced by `pivot.foreignPivotKey` */
    parentKey?: string;
}

export function belongsToMany(
    relatedTable: string,
    pivot: PivotTable,
    options: RelationshipOptions & PivotKeyOptions = {},
): BelongsToManyRelationship {
    const { relatedKey = 'id', parentKey = 'id', ...rest } = options;
    return { kind: RelationshipKind.BELONGS_TO_MANY, relatedTable, pivot, foreignKey: relatedKey, localKey: parentKey, ...rest };
}

/**
 * `relatedTable.foreignKey` references `through.secondLocalKey`, `through.firstKey` references `parent.localKey`.
 */
export function hasOneThrough(
    relatedTable: string,
    through: ThroughTable,
    foreignKey: string,
    localKey = 'id',
    options: RelationshipOptions = {},
): ThroughRelationship {
    return { kind: RelationshipKind.HAS_ONE_THROUGH, relatedTable, through, foreignKey, localKey, ...options };
}

export function hasManyThrough(
    relatedTable: string,
    through: ThroughTable,
    foreignKey: string,
    localKey = 'id',
    options: RelationshipOptions = {},
): ThroughRelationship {
    return { kind: RelationshipKind.HAS_MANY_THROUGH, relatedTable, through, foreignKey, localKey, ...options };
}

/**
 * Polymorphic parent: `<name>_type` picks the table among `targets`, `<name>_id` references its `ownerKey`.
 */
export function morphTo(
    name: string,
    targets: Readonly<Record<string, string>>,
    ownerKey = 'id',
    options: RelationshipOptions = {},
): MorphToRelationship {
    return {
        kind: RelationshipKind.MORPH_TO,
        morphType: `${name}_type`,
        foreignKey: `${name}_id`,
        localKey: ownerKey,
        targets,
        ...options,
    };
}

export function morphOne(
    relatedTable: string,
    name: string,
    morphClass: string,
    localKey = 'id',
    options: RelationshipOptions = {},
): MorphManyRelationship {
    return {
        kind: RelationshipKind.MORPH_ONE,
        relatedTable,
        morphType: `${name}_type`,
        foreignKey: `${name}_id`,
        morphClass,
        localKey,
        ...options,
    };
}

export function morphMany(
    relatedTable: string,
    name: string,
    morphClass: string,
    localKey = 'id',
    options: RelationshipOptions = {},
): MorphManyRelationship {
    return {
        kind: RelationshipKind.MORPH_MANY,
        relatedTable,
        morphType: `${name}_type`,
        foreignKey: `${name}_id`,
        morphClass,
        localKey,
        ...options,
    };
}

/**
 * Polymorphic many-to-many through `pivotTable` (`<name>_type`, `<name>_id`, `relatedPivotKey`).
 */
export function morphToMany(
    relatedTable: string,
    pivotTable: string,
    name: string,
    morphClass: string,
    relatedPivotKey: string,
    options: RelationshipOptions & PivotKeyOptions = {},
): MorphToManyRelationship {
    const { relatedKey = 'id', parentKey = 'id', ...rest } = options;
    return {
        kind: RelationshipKind.MORPH_TO_MANY,
        relatedTable,
        pivot: { table: pivotTable, foreignPivotKey: `${name}_id`, relatedPivotKey },
        morphType: `${name}_type`,
        morphClass,
        foreignKey: relatedKey,
        localKey: parentKey,
        ...rest,
    };
}

/**
 * Column of the parent rows that holds the values to look related rows up by.
 */
export function parentKeyOf(relationship: Relationship): string {
    switch (relationship.kind) {
        case RelationshipKind.BELONGS_TO:
        case RelationshipKind.MORPH_TO:
            return relationship.foreignKey;
        default:
            return relationship.localKey;
    }
}

export function isToOne(relationship: Relationship): boolean {
    switch (relationship.kind) {
        case RelationshipKind.HAS_ONE:
        case RelationshipKind.BELONGS_TO:
        case RelationshipKind.HAS_ONE_THROUGH:
        case RelationshipKind.MORPH_TO:
        case RelationshipKind.MORPH_ONE:
            return true;
        default:
            return false;
    }
}

/**
 * Every identifier a relationship puts into SQL text.
 */
export function identifiersOf(relationship: Relationship): string[] {
    const columns = [relationship.foreignKey, relationship.localKey, ...(relationship.select ?? [])];
    const constraintColumns = (relationship.constraints ?? []).map((constraint) => constraint.column);

    switch (relationship.kind) {
        case RelationshipKind.MORPH_TO:
            return [...columns, ...constraintColumns, relationship.morphType, ...Object.values(relationship.targets)];
        case RelationshipKind.BELONGS_TO_MANY:
            return [...columns, ...constraintColumns, relationship.relatedTable, ...Object.values(relationship.pivot)];
        case RelationshipKind.MORPH_TO_MANY:
            return [...columns, ...constraintColumns, relationship.relatedTable, relationship.morphType, ...Object.values(relationship.pivot)];
        case RelationshipKind.HAS_ONE_THROUGH:
        case RelationshipKind.HAS_MANY_THROUGH:
            return [...columns, ...constraintColumns, relationship.relatedTable, ...Object.values(relationship.through)];
        case RelationshipKind.MORPH_ONE:
        case RelationshipKind.MORPH_MANY:
            return [...columns, ...constraintColumns, relationship.relatedTable, relationship.morphType];
        default:
            return [...columns, ...constraintColumns, relationship.relatedTable];
    }
}
