import { ContentMap } from '../../../src/domain/entities/ContentValue';
import { createDefaultFieldMappingConfig, FieldMappingConfig } from '../../../src/domain/entities/FieldMapping';
import { FieldTranslation } from '../../../src/domain/entities/FieldTranslation';
import {
    assemble,
    computeProviderStats,
    findLeafCollisions,
    TRANSLATION_METADATA_KEY
} from '../../../src/domain/services/ReconstructionEngine';

const NOW = new Date('2026-01-02T03:04:05.000Z');

function translation(path: string, originalText: string, translatedText: string, overrides: Partial<FieldTranslation> = {}): FieldTranslation {
    return {
        path,
        originalText,
        translatedText,
        status: 'translated',
        provider: 'mock',
        model: 'mock-model',
        sourceLang: 'en',
        targetLang: 'fr',
        qualityScore: 1,
        metadata: { approach: 'single' },
        ...overrides
    };
}

function makeConfig(overrides: Partial<FieldMappingConfig>): FieldMappingConfig {
    return { ...createDefaultFieldMappingConfig('client-1', 'articles'), ...overrides };
}

describe('ReconstructionEngine', () => {
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        warnSpy.mockRestore();
    });

    describe('collection_translations', () => {
        it('should build a translations row keyed to the primary collection', () => {
            const config = makeConfig({
                translationPattern: 'collection_translations',
                primaryCollection: 'articles',
                collectionName: 'articles_translations'
            });

            const result = assemble({ id: 42, title: 'Hi' }, [translation('title', 'Hi', 'Bonjour')], config, 'fr', NOW);

            expect(result).toEqual({ id: null, articles_id: 42, languages_code: 'fr', title: 'Bonjour' });
        });

        it('should fall back to the collection name and a null id', () => {
            const config = makeConfig({ translationPattern: 'collection_translations' });

            const result = assemble({ title: 'Hi' }, [translation('seo.title', 'Hi', 'Salut')], config, 'fr', NOW);

            expect(result).toEqual({ id: null, articles_id: null, languages_code: 'fr', title: 'Salut' });
        });

        it('should warn about colliding leaf names and keep the last one', () => {
            const config = makeConfig({ translationPattern: 'collection_translations' });

            const result = assemble(
                { id: 1 },
                [translation('title', 'A', 'a-fr'), translation('seo.title', 'B', 'b-fr')],
                config,
                'fr',
                NOW
            );

            expect(result.title).toBe('b-fr');
            expect(warnSpy).toHaveBeenCalledWith('[Reconstruction] Paths title, seo.title share the leaf "title"; keeping seo.title');
        });
    });

    describe('language_collections', () => {
        it('should build a row with the original id and leaf names', () => {
            const config = makeConfig({ translationPattern: 'language_collections' });

            const result = assemble(
                { id: 'a1', title: 'Hi', content: { body: 'Text' } },
                [translation('title', 'Hi', 'Salut'), translation('content.body', 'Text', 'Texte')],
                config,
                'fr',
                NOW
            );

            expect(result).toEqual({ id: 'a1', title: 'Salut', body: 'Texte' });
        });
    });

    describe('merge_in_place', () => {
        const config = makeConfig({ translationPattern: 'merge_in_place' });

        it('should overwrite translated paths and attach metadata', () => {
            const original: ContentMap = { id: 7, title: 'Hi', blocks: [{ body: 'Yes' }], summary: 'Short' };

            const result = assemble(original, [
                translation('title', 'Hi', 'Salut', { qualityScore: 1 }),
                translation('blocks[0].body', 'Yes', 'Oui', { qualityScore: 0.5 }),
                translation('summary', 'Short', 'Short', { status: 'failed', qualityScore: 0, error: 'boom' })
            ], config, 'fr', NOW);

            expect(result).toEqual({
                id: 7,
                title: 'Salut',
                blocks: [{ body: 'Oui' }],
                summary: 'Short',
                [TRANSLATION_METADATA_KEY]: {
                    translated_at: '2026-01-02T03:04:05.000Z',
                    target_language: 'fr',
                    fields_translated: ['title', 'blocks[0].body'],
                    provider_stats: {
                        providers: {
                            mock: { count: 2, quality_scores: [1, 0.5], avg_quality: 0.75 }
                        },
                        overall_avg_quality: 0.75
                    }
                }
            });
        });

        it('should never mutate the original document', () => {
            const original: ContentMap = { title: 'Hi', nested: { body: 'Text' } };
            const snapshot = structuredClone(original);

            assemble(original, [translation('nested.body', 'Text', 'Texte')], config, 'fr', NOW);

            expect(original).toEqual(snapshot);
        });

        it('should warn when a path cannot be written', () => {
            const result = assemble({ items: [] }, [translation('items[0]', 'x', 'y')], config, 'fr', NOW);

            expect(result.items).toEqual([]);
            expect(warnSpy).toHaveBeenCalledWith('[Reconstruction] Could not write translated value at items[0]');
        });
    });

    describe('computeProviderStats', () => {
        it('should ignore failed units', () => {
            const stats = computeProviderStats([
                translation('a', 'x', 'y', { provider: 'openai', qualityScore: 0.5 }),
                translation('b', 'x', 'x', { provider: 'openai', status: 'failed', qualityScore: 0 })
            ]);

            expect(stats).toEqual({
                providers: { openai: { count: 1, qualityScores: [0.5], avgQuality: 0.5 } },
                overallAvgQuality: 0.5
            });
        });

        it('should report zero for no translations', () => {
            expect(computeProviderStats([])).toEqual({ providers: {}, overallAvgQuality: 0 });
        });
    });

    describe('findLeafCollisions', () => {
        it('should group paths sharing a leaf', () => {
            expect(findLeafCollisions(['title', 'seo.title', 'body'])).toEqual({ title: ['title', 'seo.title'] });
        });
    });
});
