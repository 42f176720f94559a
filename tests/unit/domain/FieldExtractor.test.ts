import { createDefaultFieldMappingConfig, FieldMappingConfig } from '../../../src/domain/entities/FieldMapping';
import { METRICS } from '../../../src/domain/ports/IMetricsPort';
import { detectFieldType, FieldExtractor, resolveFieldPaths } from '../../../src/domain/services/FieldExtractor';
import { ConsoleMetricsAdapter } from '../../../src/infrastructure/metrics/ConsoleMetricsAdapter';

function makeConfig(overrides: Partial<FieldMappingConfig>): FieldMappingConfig {
    return { ...createDefaultFieldMappingConfig('client-1', 'articles'), ...overrides };
}

describe('FieldExtractor', () => {
    let metrics: ConsoleMetricsAdapter;
    let extractor: FieldExtractor;

    beforeEach(() => {
        metrics = new ConsoleMetricsAdapter({ enabled: false });
        extractor = new FieldExtractor(metrics);
    });

    describe('detectFieldType', () => {
        it('should classify values', () => {
            expect(detectFieldType('<p>x</p>')).toBe('wysiwyg');
            expect(detectFieldType('line one\nline two')).toBe('textarea');
            expect(detectFieldType('plain')).toBe('text');
            expect(detectFieldType({ a: 1 })).toBe('json');
            expect(detectFieldType([1, 2])).toBe('json');
            expect(detectFieldType(42)).toBe('string');
            expect(detectFieldType(true)).toBe('string');
        });
    });

    describe('extract', () => {
        it('should extract a plain field and a rich text field with its tag structure', () => {
            const config = makeConfig({
                fieldPaths: ['title', 'body'],
                fieldTypes: { body: 'wysiwyg' }
            });

            const result = extractor.extract({ title: 'Hello', body: '<p>Hi <b>there</b></p>' }, config);

            expect(Object.keys(result.fields)).toEqual(['title', 'body']);
            expect(result.fields.title).toEqual({ path: 'title', value: 'Hello', type: 'text', metadata: {} });
            expect(result.fields.body.type).toBe('wysiwyg');
            expect(result.fields.body.metadata.htmlStructure?.tags).toEqual(['p', 'b']);
            expect(result.batch).toBeUndefined();
        });

        it('should skip missing and null values', () => {
            const config = makeConfig({ fieldPaths: ['title', 'subtitle', 'missing'] });

            const result = extractor.extract({ title: 'Hello', subtitle: null }, config);

            expect(Object.keys(result.fields)).toEqual(['title']);
        });

        it('should group plain text into a batch in field-path order', () => {
            const config = makeConfig({
                fieldPaths: ['t1', 'rich', 't2', 'meta', 'count'],
                batchProcessing: true
            });

            const result = extractor.extract({
                t1: 'a',
                rich: '<i>d</i>',
                t2: 'b',
                meta: { nested: true },
                count: 3
            }, config);

            expect(result.batch).toEqual({
                texts: ['a', 'b'],
                mapping: {
                    t1: { index: 0, type: 'text' },
                    t2: { index: 1, type: 'text' }
                }
            });
            expect(result.fields.t1.batchIndex).toBe(0);
            expect(result.fields.t2.batchIndex).toBe(1);
            expect(result.fields.rich.batchIndex).toBeUndefined();
            expect(result.fields.meta.type).toBe('json');
            expect(result.fields.count.batchIndex).toBeUndefined();
        });

        it('should use the RTL field paths for an RTL target', () => {
            const config = makeConfig({
                fieldPaths: ['title', 'body'],
                rtlFieldMapping: { ar: { fieldPaths: ['title_rtl'] } }
            });
            const content = { title: 'Hello', body: 'World', title_rtl: 'Hello RTL' };

            expect(Object.keys(extractor.extract(content, config, 'ar').fields)).toEqual(['title_rtl']);
            expect(Object.keys(extractor.extract(content, config, 'fr').fields)).toEqual(['title', 'body']);
            expect(resolveFieldPaths(config, 'he')).toEqual(['title', 'body']);
        });

        it('should record the extraction in metrics', () => {
            const config = makeConfig({ fieldPaths: ['title'] });

            extractor.extract({ title: 'Hello' }, config);

            expect(metrics.getCounterTotal(METRICS.EXTRACTIONS, { success: true })).toBe(1);
            expect(metrics.getRecords('duration', METRICS.EXTRACT_DURATION)).toHaveLength(1);
        });

        it('should time each extraction with a metrics timer', () => {
            const stop = jest.fn();
            const startTimer = jest.spyOn(metrics, 'startTimer').mockReturnValue(stop);
            const config = makeConfig({ fieldPaths: ['title'] });

            extractor.extract({ title: 'Hello' }, config);

            expect(startTimer).toHaveBeenCalledWith(METRICS.EXTRACT_DURATION, { client: config.clientId, collection: config.collectionName });
            expect(stop).toHaveBeenCalledTimes(1);
        });
    });

    describe('validateFieldPaths', () => {
        it('should report which paths resolve', () => {
            const report = extractor.validateFieldPaths(
                { title: 'Hello', blocks: [{ body: '<p>x</p>' }], tags: ['a'] },
                ['title', 'blocks[0].body', 'tags', 'missing']
            );

            expect(report).toEqual({
                results: {
                    'title': { exists: true, valueType: 'string', detectedFieldType: 'text' },
                    'blocks[0].body': { exists: true, valueType: 'string', detectedFieldType: 'wysiwyg' },
                    'tags': { exists: true, valueType: 'list', detectedFieldType: 'json' },
                    'missing': { exists: false, valueType: null, detectedFieldType: null }
                },
                totalValid: 3,
                totalTested: 4
            });
        });
    });

    describe('buildPreview', () => {
        it('should describe what would be translated', () => {
            const config = makeConfig({
                fieldPaths: ['title', 'summary'],
                batchProcessing: true,
                rtlFieldMapping: { ar: { fieldPaths: ['title'] } },
                translationPattern: 'merge_in_place'
            });
            const extraction = extractor.extract({ title: 'Hello', summary: 'Short' }, config, 'fr');

            const preview = extractor.buildPreview(extraction, config, 'ar');

            expect(preview).toEqual({
                extractableFields: {
                    title: { content: 'Hello', type: 'text', metadata: {}, isBatch: true },
                    summary: { content: 'Short', type: 'text', metadata: {}, isBatch: true }
                },
                fieldConfig: {
                    totalFields: 2,
                    batchProcessing: true,
                    translationPattern: 'merge_in_place',
                    rtlSupport: true
                }
            });
        });
    });
});
