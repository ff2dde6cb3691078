import type { FilterOperator } from './filter.interface';
import type { SqlFragment } from './sql.interface';

export enum RelationshipKind {
    HAS_ONE = 'has_one',
    HAS_MANY = 'has_many',
    BELONGS_TO = 'belongs_to',
    BELONGS_TO_MANY = 'belongs_to_many',
    HAS_ONE_THROUGH = 'has_one_through',
    HAS_MANY_THROUGH = 'has_many_through',
    MORPH_TO = 'morph_to',
    MORPH_ONE = 'morph_one',
    MORPH_MANY = 'morph_many',
    MORPH_TO_MANY = 'morph_to_many',
}

/**
 * Fixed predicate ANDed into every eager load of a relationship (e.g. "only active rows").
 */
export interface RelationshipConstraint {
    column: string;
    operator: FilterOperator;
    value?: unknown;
}

export type RelationshipMap = Readonly<Record<string, Relationship>>;

interface RelationshipBase {
    /**
     * Column on the related side (has-*, morph-*) or on the parent side (belongs_to).
     */
    foreignKey: string;
    /**
     * Column on the parent side (has-*, morph-*) or the owner key on the related table (belongs_to).
     */
    localKey: string;
    constraints?: RelationshipConstraint[];
    /**
     * Fold into the primary query as a JOIN instead of a secondary batch load.
     * Only honoured for has_one / belongs_to with a `select` list.
     */
    eager?: boolean;
    select?: string[];
    /**
     * Relationships of the related resource, for nested include paths.
     */
    relationships?: () => RelationshipMap;
}

/**
 * Settings shared by every relationship builder.
 */
export type RelationshipOptions = Pick<RelationshipBase, 'constraints' | 'eager' | 'select' | 'relationships'>;

export interface DirectRelationship extends RelationshipBase {
    kind: RelationshipKind.HAS_ONE | RelationshipKind.HAS_MANY | RelationshipKind.BELONGS_TO;
    relatedTable: string;
}

export interface PivotTable {
    table: string;
    /** pivot column pointing at the parent */
    foreignPivotKey: string;
    /** pivot column pointing at the related row */
    relatedPivotKey: string;
}

export interface BelongsToManyRelationship extends RelationshipBase {
    kind: RelationshipKind.BELONGS_TO_MANY;
    relatedTable: string;
    pivot: PivotTable;
}

export interface ThroughTable {
    table: string;
    /** column on the intermediate table pointing at the parent */
    firstKey: string;
    /** key of the intermediate table referenced by the related table's foreign key */
    secondLocalKey: string;
}

export interface ThroughRelationship extends RelationshipBase {
    kind: RelationshipKind.HAS_ONE_THROUGH | RelationshipKind.HAS_MANY_THROUGH;
    relatedTable: string;
    through: ThroughTable;
}

export interface MorphToRelationship extends RelationshipBase {
    kind: RelationshipKind.MORPH_TO;
    /** discriminator column on the parent table; `foreignKey` is the id column */
    morphType: string;
    /** discriminator value → related table */
    targets: Readonly<Record<string, string>>;
}

export interface MorphManyRelationship extends RelationshipBase {
    kind: RelationshipKind.MORPH_ONE | RelationshipKind.MORPH_MANY;
    relatedTable: string;
    /** discriminator column on the related table; `foreignKey` is the id column */
    morphType: string;
    morphClass: string;
}

export interface MorphToManyRelationship extends RelationshipBase {
    kind: RelationshipKind.MORPH_TO_MANY;
    relatedTable: string;
    /** `foreignPivotKey` is the morph id column of the pivot */
    pivot: PivotTable;
    /** discriminator column on the pivot table */
    morphType: string;
    morphClass: string;
}

export type Relationship =
    | DirectRelationship
    | BelongsToManyRelationship
    | ThroughRelationship
    | MorphToRelationship
    | MorphManyRelationship
    | MorphToManyRelationship;

export type RelationshipCardinality = 'one' | 'many';

/**
 * Secondary batched lookup generated for one validated include.
 */
export interface EagerLoadQuery extends SqlFragment {
    relationship: string;
    kind: RelationshipKind;
    /** table the rows come from */
    relatedTable: string;
    localKey: string;
    foreignKey: string;
    /** column of the parent rows holding the lookup keys */
    parentKey: string;
    /** column of the returned rows to match against `parentKey` */
    matchKey: string;
    cardinality: RelationshipCardinality;
    /** discriminator value this query was built for (morph_to only) */
    morphClass?: string;
}

export interface IncludeNode {
    relation: string;
    nested: IncludeNode[];
}
