/**
 * Relationship Traversal Service
 *
 * Translates an item together with the related items embedded in it,
 * following the collection's relationship edges. Every (collection, id)
 * is entered at most once per branch and recursion stops at `maxDepth`;
 * both limits leave a marker object in place of the related item.
 */

import {
    asContentDocument,
    ContentMap,
    ContentScalar,
    ContentValue,
    isContentList,
    isContentMap
} from '../domain/entities/ContentValue';
import {
    oneToManyAlias,
    RELATIONSHIP_TYPES,
    RELATIONSHIP_WEIGHTS,
    RelationshipEdge,
    RelationshipType,
    shouldTranslateRelated
} from '../domain/entities/Relationship';
import { errorMessage } from '../domain/errors/TranslationErrors';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';
import { IRelationshipCatalog } from '../domain/ports/IRelationshipCatalog';
import { ITranslationPort } from '../domain/ports/ITranslationPort';
import { StructuredTranslationService } from './StructuredTranslationService';

export const DEFAULT_RELATIONSHIP_MAX_DEPTH = 3;
export const DEFAULT_ANALYSIS_MAX_DEPTH = 5;

export interface RelationshipTraversalOptions {
    defaultMaxDepth?: number;
    analysisMaxDepth?: number;
    metrics?: IMetricsPort;
}

export interface RelationshipTranslationParams {
    clientId: string;
    sourceLang: string;
    targetLang: string;
    translator?: ITranslationPort;
    maxDepth?: number;
}

export interface TraversalContext {
    /** `collection:id` keys on the current branch. */
    visited: Set<string>;
    currentDepth: number;
    maxDepth: number;
    clientId: string;
    sourceLang: string;
    targetLang: string;
    translator?: ITranslationPort;
}

export interface RelationshipAnalysis {
    collection: string;
    directRelationships: number;
    relationshipTypes: Partial<Record<RelationshipType, number>>;
    circularReferences: string[];
    maxDepthFound: number;
    complexityScore: number;
    recommendations: string[];
}

function itemId(content: ContentMap): ContentScalar {
    const id = content.id;
    if (id === undefined || id === null || isContentMap(id) || isContentList(id)) {
        return 'unknown';
    }
    return id;
}

export class RelationshipTraversalService {
    private readonly edgeCache = new Map<string, RelationshipEdge[]>();

    constructor(
        private readonly translation: StructuredTranslationService,
        private readonly catalog: IRelationshipCatalog,
        private readonly options: RelationshipTraversalOptions = {}
    ) { }

    async getRelationships(collection: string): Promise<RelationshipEdge[]> {
        const cached = this.edgeCache.get(collection);
        if (cached) return cached;

        const edges = await this.catalog.getRelationships(collection);
        this.edgeCache.set(collection, edges);
        return edges;
    }

    clearRelationshipCache(): void {
        this.edgeCache.clear();
    }

    /**
     * @throws InvalidContentError when `content` is not a document
     */
    async translateWithRelationships(
        content: unknown,
        collection: string,
        params: RelationshipTranslationParams
    ): Promise<ContentMap> {
        return this.traverse(asContentDocument(content), collection, {
            visited: new Set(),
            currentDepth: 0,
            maxDepth: params.maxDepth ?? this.options.defaultMaxDepth ?? DEFAULT_RELATIONSHIP_MAX_DEPTH,
            clientId: params.clientId,
            sourceLang: params.sourceLang,
            targetLang: params.targetLang,
            translator: params.translator
        });
    }

    async traverse(content: ContentMap, collection: string, ctx: TraversalContext): Promise<ContentMap> {
        const id = itemId(content);
        const key = `${collection}:${typeof id}:${String(id)}`;

        if (ctx.visited.has(key)) {
            this.options.metrics?.incrementCounter(METRICS.RELATIONSHIP_CYCLES, { collection });
            return { _circular_reference: true, collection, id, depth: ctx.currentDepth };
        }
        if (ctx.currentDepth >= ctx.maxDepth) {
            this.options.metrics?.incrementCounter(METRICS.RELATIONSHIP_DEPTH_LIMITS, { collection });
            return { _max_depth_reached: true, collection, id, depth: ctx.currentDepth };
        }

        ctx.visited.add(key);
        try {
            const result = await this.translateOwnFields(content, collection, ctx);
            const childCtx: TraversalContext = { ...ctx, currentDepth: ctx.currentDepth + 1 };

            for (const edge of await this.getRelationships(collection)) {
                if (!shouldTranslateRelated(edge)) continue;

                switch (edge.relationshipType) {
                    case 'many_to_one':
                    case 'one_to_one':
                        await this.attachSingle(content, result, edge, childCtx);
                        break;
                    case 'one_to_many':
                        await this.attachOneToMany(content, result, edge, childCtx);
                        break;
                    case 'many_to_many':
                        await this.attachManyToMany(content, result, edge, childCtx);
                        break;
                }
            }
            return result;
        } finally {
            ctx.visited.delete(key);
        }
    }

    private async translateOwnFields(content: ContentMap, collection: string, ctx: TraversalContext): Promise<ContentMap> {
        try {
            const { translatedContent } = await this.translation.translateStructuredContent(
                content,
                ctx.clientId,
                collection,
                ctx.sourceLang,
                ctx.targetLang,
                ctx.translator
            );
            return translatedContent;
        } catch (error) {
            console.error(`[RelationshipTraversal] Translation of ${collection}:${String(itemId(content))} failed:`, error);
            return { ...content, _translation_error: errorMessage(error) };
        }
    }

    private async attachSingle(
        source: ContentMap,
        result: ContentMap,
        edge: RelationshipEdge,
        ctx: TraversalContext
    ): Promise<void> {
        const related = source[edge.sourceField];
        if (related === undefined || related === null || related === '' || related === 0 || related === false) {
            return;
        }

        const field = `${edge.sourceField}_translated`;
        if (typeof related === 'string' || typeof related === 'number') {
            result[field] = {
                id: related,
                collection: edge.targetCollection,
                _relation_type: edge.relationshipType,
                _not_expanded: true
            };
        } else if (isContentMap(related)) {
            result[field] = await this.traverse(related, edge.targetCollection, ctx);
        }
    }

    private async attachOneToMany(
        source: ContentMap,
        result: ContentMap,
        edge: RelationshipEdge,
        ctx: TraversalContext
    ): Promise<void> {
        const alias = oneToManyAlias(edge);
        const related = source[alias];

        if (related === undefined) {
            result[`${alias}_translated`] = {
                _relation_type: 'one_to_many',
                _target_collection: edge.targetCollection,
                _not_expanded: true,
                count: 0
            };
            return;
        }
        if (!isContentList(related)) return;

        const translated: ContentValue[] = [];
        for (const item of related) {
            translated.push(isContentMap(item) ? await this.traverse(item, edge.targetCollection, ctx) : item);
        }
        result[`${alias}_translated`] = translated;
    }

    private async attachManyToMany(
        source: ContentMap,
        result: ContentMap,
        edge: RelationshipEdge,
        ctx: TraversalContext
    ): Promise<void> {
        const related = source[edge.sourceField];
        if (!isContentList(related)) return;

        const translated: ContentValue[] = [];
        for (const entry of related) {
            if (!isContentMap(entry)) {
                translated.push(entry);
                continue;
            }
            const junctionItem = entry.item;
            if (edge.junctionCollection && isContentMap(junctionItem)) {
                translated.push({
                    ...entry,
                    item_translated: await this.traverse(junctionItem, edge.targetCollection, ctx)
                });
            } else {
                translated.push(await this.traverse(entry, edge.targetCollection, ctx));
            }
        }
        result[`${edge.sourceField}_translated`] = translated;
    }

    /**
     * Walks the relationship schema (not data) from `collection` and scores
     * how expensive a relationship-aware translation would be.
     */
    async analyzeRelationships(collection: string, maxDepth: number = this.options.analysisMaxDepth ?? DEFAULT_ANALYSIS_MAX_DEPTH): Promise<RelationshipAnalysis> {
        const edges = await this.getRelationships(collection);
        const analysis: RelationshipAnalysis = {
            collection,
            directRelationships: edges.length,
            relationshipTypes: {},
            circularReferences: [],
            maxDepthFound: 0,
            complexityScore: 0,
            recommendations: []
        };

        for (const edge of edges) {
            analysis.relationshipTypes[edge.relationshipType] = (analysis.relationshipTypes[edge.relationshipType] ?? 0) + 1;
        }

        await this.walkSchema(collection, 0, maxDepth, new Set(), analysis);
        analysis.complexityScore = complexityScore(analysis);
        analysis.recommendations = recommendations(analysis);
        return analysis;
    }

    private async walkSchema(
        collection: string,
        depth: number,
        maxDepth: number,
        visited: ReadonlySet<string>,
        analysis: RelationshipAnalysis
    ): Promise<void> {
        if (visited.has(collection)) {
            analysis.circularReferences.push(collection);
            return;
        }
        if (depth >= maxDepth) return;

        analysis.maxDepthFound = Math.max(analysis.maxDepthFound, depth);
        const branch = new Set(visited).add(collection);

        for (const edge of await this.getRelationships(collection)) {
            await this.walkSchema(edge.targetCollection, depth + 1, maxDepth, branch, analysis);
        }
    }
}

export function complexityScore(analysis: RelationshipAnalysis): number {
    let score = analysis.directRelationships * 10;
    for (const type of RELATIONSHIP_TYPES) {
        score += RELATIONSHIP_WEIGHTS[type] * (analysis.relationshipTypes[type] ?? 0);
    }
    score += analysis.maxDepthFound * 20;
    score += analysis.circularReferences.length * 50;
    return score;
}

export function recommendations(analysis: RelationshipAnalysis): string[] {
    const result: string[] = [];
    const score = analysis.complexityScore;

    if (score < 50) {
        result.push('Low complexity - standard translation settings recommended');
    } else if (score < 150) {
        result.push('Medium complexity - consider limiting relationship depth to 2-3 levels');
    } else {
        result.push('High complexity - limit relationship depth to 1-2 levels for performance');
    }

    if (analysis.circularReferences.length > 0) {
        result.push('Circular references detected - ensure cycle detection is enabled');
    }
    if ((analysis.relationshipTypes.many_to_many ?? 0) > 3) {
        result.push('Many many-to-many relationships - consider selective translation');
    }
    if ((analysis.relationshipTypes.one_to_many ?? 0) > 5) {
        result.push('Many one-to-many relationships - use batch processing');
    }
    if (analysis.maxDepthFound > 4) {
        result.push('Deep nesting detected - consider flattening the structure or limiting depth');
    }
    return result;
}
