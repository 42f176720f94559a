import { RelationshipEdge } from '../entities/Relationship';

/**
 * Relationship Catalog Port
 *
 * Source of the relationship schema: the edges leaving each collection.
 */
export interface IRelationshipCatalog {
    getRelationships(collectionName: string): Promise<RelationshipEdge[]>;
}
