import { fieldConfigKey } from '../../../src/application/cache/CacheKeys';
import { FieldMappingCache } from '../../../src/application/cache/FieldMappingCache';
import { createDefaultFieldMappingConfig, FieldMappingConfig } from '../../../src/domain/entities/FieldMapping';
import { FieldExtractor } from '../../../src/domain/services/FieldExtractor';
import { InMemoryKeyValueStore } from '../../../src/infrastructure/cache/InMemoryKeyValueStore';

function makeConfig(clientId: string, collectionName: string, fieldPaths: string[]): FieldMappingConfig {
    return { ...createDefaultFieldMappingConfig(clientId, collectionName), fieldPaths };
}

describe('FieldMappingCache', () => {
    let now: number;
    let store: InMemoryKeyValueStore;
    let cache: FieldMappingCache;
    const extractor = new FieldExtractor();

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
        now = 0;
        store = new InMemoryKeyValueStore(() => now);
        cache = new FieldMappingCache(store, { configTtlSeconds: 60, maxContentSize: 200 });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('configs', () => {
        it('should return a stored config until it expires', async () => {
            const config = makeConfig('c1', 'articles', ['title']);
            expect(await cache.setConfig(config)).toBe(true);

            now = 59_999;
            expect(await cache.getConfig('c1', 'articles')).toEqual(config);

            now = 60_000;
            expect(await cache.getConfig('c1', 'articles')).toBeNull();
        });

        it('should treat entries of the wrong shape as misses', async () => {
            await store.set(fieldConfigKey('c1', 'articles'), JSON.stringify({ unexpected: true }));
            expect(await cache.getConfig('c1', 'articles')).toBeNull();

            await store.set(fieldConfigKey('c1', 'pages'), 'not json');
            expect(await cache.getConfig('c1', 'pages')).toBeNull();

            expect((await cache.getStats()).configs).toEqual({ hits: 0, misses: 1 });
        });

        it('should invalidate one collection or a whole client', async () => {
            await cache.setConfig(makeConfig('c1', 'articles', ['title']));
            await cache.setConfig(makeConfig('c1', 'pages', ['title']));
            await cache.setConfig(makeConfig('c2', 'articles', ['title']));

            expect(await cache.invalidateClient('c1', 'articles')).toBe(1);
            expect(await cache.getConfig('c1', 'articles')).toBeNull();
            expect(await cache.getConfig('c1', 'pages')).not.toBeNull();

            expect(await cache.invalidateClient('c1')).toBe(1);
            expect(await cache.getConfig('c1', 'pages')).toBeNull();
            expect(await cache.getConfig('c2', 'articles')).not.toBeNull();
        });
    });

    describe('extractions', () => {
        const content = { title: 'Hello' };

        it('should only return extractions made under the same config', async () => {
            const config = makeConfig('c1', 'articles', ['title']);
            const changed = makeConfig('c1', 'articles', ['title', 'body']);
            const result = extractor.extract(content, config);

            expect(await cache.setExtraction(content, config, result)).toBe(true);

            expect(await cache.getExtraction(content, config)).toEqual(result);
            expect(await cache.getExtraction(content, changed)).toBeNull();
            expect(await cache.getExtraction(content, config, 'fr')).toBeNull();
        });

        it('should skip content larger than the size limit', async () => {
            const config = makeConfig('c1', 'articles', ['title']);
            const large = { title: 'x'.repeat(300) };

            expect(await cache.setExtraction(large, config, extractor.extract(large, config))).toBe(false);
            expect(await cache.getExtraction(large, config)).toBeNull();
        });

        it('should keep documents with a long shared prefix apart', async () => {
            const roomy = new FieldMappingCache(store, { maxContentSize: 200_000 });
            const config = makeConfig('c1', 'articles', ['title']);
            const first = { a_body: 'x'.repeat(60_000), title: 'first' };
            const second = { a_body: 'x'.repeat(60_000), title: 'second' };

            await roomy.setExtraction(first, config, extractor.extract(first, config));

            expect(await roomy.getExtraction(second, config)).toBeNull();
            expect((await roomy.getExtraction(first, config))?.fields.title.value).toBe('first');
        });

        it('should drop extractions by config hash', async () => {
            const config = makeConfig('c1', 'articles', ['title']);
            await cache.setExtraction(content, config, extractor.extract(content, config));
            await cache.setExtraction(content, config, extractor.extract(content, config, 'fr'), 'fr');

            expect(await cache.invalidateExtractions()).toBe(2);
            expect(await cache.getExtraction(content, config)).toBeNull();
        });
    });

    describe('validations', () => {
        it('should key reports on paths and content', async () => {
            const report = extractor.validateFieldPaths({ title: 'x' }, ['title']);
            await cache.setValidation('c1', 'articles', ['title'], { title: 'x' }, report);

            expect(await cache.getValidation('c1', 'articles', ['title'], { title: 'x' })).toEqual(report);
            expect(await cache.getValidation('c1', 'articles', ['title'], { title: 'y' })).toBeNull();
            expect(await cache.getValidation('c1', 'articles', ['title', 'body'], { title: 'x' })).toBeNull();
        });

        it('should be dropped with the client', async () => {
            const report = extractor.validateFieldPaths({ title: 'x' }, ['title']);
            await cache.setValidation('c1', 'articles', ['title'], { title: 'x' }, report);

            await cache.invalidateClient('c1');

            expect(await cache.getValidation('c1', 'articles', ['title'], { title: 'x' })).toBeNull();
        });
    });

    describe('getStats', () => {
        it('should count hits and misses per kind', async () => {
            const config = makeConfig('c1', 'articles', ['title']);
            await cache.getConfig('c1', 'articles');
            await cache.setConfig(config);
            await cache.getConfig('c1', 'articles');
            await cache.getExtraction({ title: 'x' }, config);

            expect(await cache.getStats()).toEqual({
                configs: { hits: 1, misses: 1 },
                extractions: { hits: 0, misses: 1 },
                validations: { hits: 0, misses: 0 }
            });
        });
    });
});
