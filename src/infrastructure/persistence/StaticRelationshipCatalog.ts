import { RelationshipEdge } from '../../domain/entities/Relationship';
import { IRelationshipCatalog } from '../../domain/ports/IRelationshipCatalog';

/**
 * Relationship Catalog over a fixed list of edges, e.g. loaded from a
 * schema export at startup.
 */
export class StaticRelationshipCatalog implements IRelationshipCatalog {
    private readonly bySource: Map<string, RelationshipEdge[]> = new Map();

    constructor(edges: RelationshipEdge[]) {
        for (const edge of edges) {
            const list = this.bySource.get(edge.sourceCollection) ?? [];
            list.push({ ...edge });
            this.bySource.set(edge.sourceCollection, list);
        }
    }

    async getRelationships(collectionName: string): Promise<RelationshipEdge[]> {
        return (this.bySource.get(collectionName) ?? []).map(edge => ({ ...edge }));
    }
}
