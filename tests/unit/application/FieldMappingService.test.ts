import { FieldMappingCache } from '../../../src/application/cache/FieldMappingCache';
import { FieldMappingService } from '../../../src/application/FieldMappingService';
import { createDefaultFieldMappingConfig, FieldMappingConfig } from '../../../src/domain/entities/FieldMapping';
import { ConfigValidationError } from '../../../src/domain/errors/TranslationErrors';
import { FieldExtractor } from '../../../src/domain/services/FieldExtractor';
import { InMemoryKeyValueStore } from '../../../src/infrastructure/cache/InMemoryKeyValueStore';
import { InMemoryFieldConfigRepository } from '../../../src/infrastructure/persistence/InMemoryFieldConfigRepository';

const CLIENT = 'client-1';

function storedConfig(overrides: Partial<FieldMappingConfig> = {}): FieldMappingConfig {
    return {
        ...createDefaultFieldMappingConfig(CLIENT, 'articles'),
        fieldPaths: ['title', 'body'],
        fieldTypes: { body: 'wysiwyg' },
        ...overrides
    };
}

describe('FieldMappingService', () => {
    let repository: InMemoryFieldConfigRepository;
    let extractor: FieldExtractor;
    let cache: FieldMappingCache;
    let service: FieldMappingService;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        repository = new InMemoryFieldConfigRepository([storedConfig()]);
        extractor = new FieldExtractor();
        cache = new FieldMappingCache(new InMemoryKeyValueStore());
        service = new FieldMappingService(repository, extractor, cache);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('getConfig', () => {
        it('should load from the repository once and then from the cache', async () => {
            const findConfig = jest.spyOn(repository, 'findConfig');

            const first = await service.getConfig(CLIENT, 'articles');
            const second = await service.getConfig(CLIENT, 'articles');

            expect(first).toEqual(storedConfig());
            expect(second).toEqual(storedConfig());
            expect(findConfig).toHaveBeenCalledTimes(1);
            expect(await cache.getStats()).toMatchObject({ configs: { hits: 1, misses: 1 } });
        });

        it('should return an uncached default config for unknown collections', async () => {
            const first = await service.getConfig(CLIENT, 'pages');
            await service.getConfig(CLIENT, 'pages');

            expect(first).toEqual(createDefaultFieldMappingConfig(CLIENT, 'pages'));
            expect(await cache.getStats()).toMatchObject({ configs: { hits: 0, misses: 2 } });
        });

        it('should work without a cache', async () => {
            const uncached = new FieldMappingService(repository, extractor);

            expect(await uncached.getConfig(CLIENT, 'articles')).toEqual(storedConfig());
        });
    });

    describe('saveConfig', () => {
        it('should validate, store and replace the cached copy', async () => {
            await service.getConfig(CLIENT, 'articles');

            const saved = await service.saveConfig({
                clientId: CLIENT,
                collectionName: 'articles',
                fieldPaths: ['headline'],
                translationPattern: 'merge_in_place'
            });

            expect(saved.fieldPaths).toEqual(['headline']);
            expect((await service.getConfig(CLIENT, 'articles')).fieldPaths).toEqual(['headline']);
            expect((await repository.findConfig(CLIENT, 'articles'))?.translationPattern).toBe('merge_in_place');
        });

        it('should reject invalid configs without storing them', async () => {
            const save = jest.spyOn(repository, 'saveConfig');

            await expect(service.saveConfig({ clientId: CLIENT, collectionName: 'articles', fieldPaths: ['a..b'] }))
                .rejects.toThrow(ConfigValidationError);
            expect(save).not.toHaveBeenCalled();
        });
    });

    describe('deleteConfig and listConfigs', () => {
        it('should delete a config and drop its cached copy', async () => {
            await service.getConfig(CLIENT, 'articles');

            expect(await service.deleteConfig(CLIENT, 'articles')).toBe(true);
            expect(await service.getConfig(CLIENT, 'articles')).toEqual(createDefaultFieldMappingConfig(CLIENT, 'articles'));
            expect(await service.deleteConfig(CLIENT, 'articles')).toBe(false);
        });

        it('should list the configs of one client by collection name', async () => {
            await service.saveConfig({ clientId: CLIENT, collectionName: 'authors' });
            await service.saveConfig({ clientId: 'client-2', collectionName: 'pages' });

            const configs = await service.listConfigs(CLIENT);

            expect(configs.map(c => c.collectionName)).toEqual(['articles', 'authors']);
        });
    });

    describe('extractWithCache', () => {
        it('should reuse a cached extraction for the same content and config', async () => {
            const extract = jest.spyOn(extractor, 'extract');
            const config = storedConfig();
            const content = { title: 'Hello', body: '<p>Hi</p>' };

            const first = await service.extractWithCache(content, config, 'fr');
            const second = await service.extractWithCache(content, config, 'fr');

            expect(extract).toHaveBeenCalledTimes(1);
            expect(second).toEqual(first);
        });

        it('should not serve one document\'s fields for another with the same long prefix', async () => {
            const roomy = new FieldMappingService(
                repository,
                extractor,
                new FieldMappingCache(new InMemoryKeyValueStore(), { maxContentSize: 200_000 })
            );
            const config = storedConfig({ fieldPaths: ['title'] });
            const body = 'x'.repeat(60_000);

            await roomy.extractWithCache({ a_body: body, title: 'first' }, config, 'fr');
            const second = await roomy.extractWithCache({ a_body: body, title: 'second' }, config, 'fr');

            expect(second.fields.title.value).toBe('second');
        });

        it('should extract again for another target language', async () => {
            const extract = jest.spyOn(extractor, 'extract');
            const content = { title: 'Hello' };

            await service.extractWithCache(content, storedConfig(), 'fr');
            await service.extractWithCache(content, storedConfig(), 'de');

            expect(extract).toHaveBeenCalledTimes(2);
        });
    });

    describe('validateFieldPaths', () => {
        it('should cache reports per paths and content', async () => {
            const validate = jest.spyOn(extractor, 'validateFieldPaths');

            const report = await service.validateFieldPaths(CLIENT, 'articles', { title: 'Hello' }, ['title', 'body']);
            await service.validateFieldPaths(CLIENT, 'articles', { title: 'Hello' }, ['title', 'body']);
            const other = await service.validateFieldPaths(CLIENT, 'articles', { body: 'Text' }, ['title', 'body']);

            expect(validate).toHaveBeenCalledTimes(2);
            expect(report.totalValid).toBe(1);
            expect(report.results.title.exists).toBe(true);
            expect(other.results.title.exists).toBe(false);
            expect(other.results.body.exists).toBe(true);
        });
    });

    describe('preview', () => {
        it('should preview the stored config of a collection', async () => {
            const preview = await service.previewForCollection({ title: 'Hello', body: '<p>Hi</p>' }, CLIENT, 'articles', 'fr');

            expect(Object.keys(preview.extractableFields)).toEqual(['title', 'body']);
            expect(preview.extractableFields.body.metadata).toEqual({
                htmlStructure: { tags: ['p'], classes: [], attributes: {} }
            });
            expect(preview.fieldConfig).toEqual({
                totalFields: 2,
                batchProcessing: false,
                translationPattern: 'collection_translations',
                rtlSupport: false
            });
        });
    });
});
