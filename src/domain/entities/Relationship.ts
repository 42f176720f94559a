/**
 * Relationship schema between CMS collections.
 */

export const RELATIONSHIP_TYPES = ['many_to_one', 'one_to_many', 'many_to_many', 'one_to_one'] as const;

export type RelationshipType = typeof RELATIONSHIP_TYPES[number];

export interface RelationshipEdge {
    sourceCollection: string;
    sourceField: string;
    targetCollection: string;
    targetField?: string;
    relationshipType: RelationshipType;
    /** Junction collection of a many-to-many edge. */
    junctionCollection?: string;
    /** Where one-to-many items are found on the source item (default `<target>_items`). */
    aliasField?: string;
    /** Defaults to true. */
    translateRelated?: boolean;
}

/** Weight of each relationship type in the complexity score. */
export const RELATIONSHIP_WEIGHTS: Record<RelationshipType, number> = {
    many_to_one: 5,
    one_to_many: 15,
    many_to_many: 25,
    one_to_one: 3
};

export function oneToManyAlias(edge: RelationshipEdge): string {
    return edge.aliasField ?? `${edge.targetCollection}_items`;
}

export function shouldTranslateRelated(edge: RelationshipEdge): boolean {
    return edge.translateRelated ?? true;
}
