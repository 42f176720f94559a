/**
 * Field Extractor
 *
 * Pulls the configured translatable fields out of a document, detects
 * their types and groups plain text for batch translation.
 */

import { ContentMap, ContentValue, describeContentType, isContentList, isContentMap } from '../entities/ContentValue';
import {
    BATCHABLE_TYPES,
    BatchGroup,
    ExtractedField,
    ExtractionResult,
    FieldMappingConfig,
    FieldMetadata,
    FieldType,
    RICH_TEXT_TYPES
} from '../entities/FieldMapping';
import { isRtlLanguage, normalizeLanguageCode } from '../entities/Language';
import { IMetricsPort, METRICS } from '../ports/IMetricsPort';
import { describeStructure, isHtml } from './HtmlTextNodeCodec';
import { getPath } from './PathResolver';

export interface PathValidation {
    exists: boolean;
    valueType: string | null;
    detectedFieldType: FieldType | null;
}

export interface PathValidationReport {
    results: Record<string, PathValidation>;
    totalValid: number;
    totalTested: number;
}

export interface PreviewField {
    content: ContentValue;
    type: FieldType;
    metadata: FieldMetadata;
    isBatch: boolean;
}

export interface ExtractionPreview {
    extractableFields: Record<string, PreviewField>;
    fieldConfig: {
        totalFields: number;
        batchProcessing: boolean;
        translationPattern: FieldMappingConfig['translationPattern'];
        rtlSupport: boolean;
    };
}

export function detectFieldType(value: ContentValue): FieldType {
    if (typeof value === 'string') {
        if (isHtml(value)) return 'wysiwyg';
        if (value.includes('\n')) return 'textarea';
        return 'text';
    }
    if (isContentMap(value) || isContentList(value)) {
        return 'json';
    }
    return 'string';
}

function buildMetadata(value: ContentValue, type: FieldType): FieldMetadata {
    if (RICH_TEXT_TYPES.has(type) && typeof value === 'string') {
        return { htmlStructure: describeStructure(value) };
    }
    return {};
}

/**
 * Field paths that apply for `language`: an RTL target with its own
 * mapping uses that mapping instead of the configured paths.
 */
export function resolveFieldPaths(config: FieldMappingConfig, language?: string): string[] {
    if (language && isRtlLanguage(language)) {
        const override = config.rtlFieldMapping[language] ?? config.rtlFieldMapping[normalizeLanguageCode(language)];
        if (override) return override.fieldPaths;
    }
    return config.fieldPaths;
}

export class FieldExtractor {
    constructor(private readonly metrics?: IMetricsPort) { }

    extract(content: ContentMap, config: FieldMappingConfig, language?: string): ExtractionResult {
        const tags = { client: config.clientId, collection: config.collectionName };
        const stopTimer = this.metrics?.startTimer(METRICS.EXTRACT_DURATION, tags);

        try {
            const fields: Record<string, ExtractedField> = {};
            let batch: BatchGroup | undefined;

            for (const path of resolveFieldPaths(config, language)) {
                const value = getPath(content, path);
                if (value === undefined || value === null) continue;

                const type = config.fieldTypes[path] ?? detectFieldType(value);
                const field: ExtractedField = { path, value, type, metadata: buildMetadata(value, type) };

                if (config.batchProcessing && BATCHABLE_TYPES.has(type) && typeof value === 'string') {
                    batch = batch ?? { texts: [], mapping: {} };
                    field.batchIndex = batch.texts.length;
                    batch.mapping[path] = { index: batch.texts.length, type };
                    batch.texts.push(value);
                }

                fields[path] = field;
            }

            this.metrics?.incrementCounter(METRICS.EXTRACTIONS, { ...tags, success: true });
            return batch ? { fields, batch } : { fields };
        } catch (error) {
            this.metrics?.incrementCounter(METRICS.EXTRACTIONS, { ...tags, success: false });
            throw error;
        } finally {
            stopTimer?.();
        }
    }

    /**
     * Reports, per path, whether it resolves in `content` and what it holds.
     */
    validateFieldPaths(content: ContentMap, paths: string[]): PathValidationReport {
        const results: Record<string, PathValidation> = {};
        let totalValid = 0;

        for (const path of paths) {
            const value = getPath(content, path);
            if (value === undefined) {
                results[path] = { exists: false, valueType: null, detectedFieldType: null };
                continue;
            }
            results[path] = {
                exists: true,
                valueType: describeContentType(value),
                detectedFieldType: detectFieldType(value)
            };
            totalValid++;
        }

        return { results, totalValid, totalTested: paths.length };
    }

    /**
     * Shows what would be translated, without translating anything.
     */
    buildPreview(extraction: ExtractionResult, config: FieldMappingConfig, targetLang: string): ExtractionPreview {
        const extractableFields: Record<string, PreviewField> = {};
        for (const [path, field] of Object.entries(extraction.fields)) {
            extractableFields[path] = {
                content: field.value,
                type: field.type,
                metadata: field.metadata,
                isBatch: field.batchIndex !== undefined
            };
        }

        return {
            extractableFields,
            fieldConfig: {
                totalFields: config.fieldPaths.length,
                batchProcessing: config.batchProcessing,
                translationPattern: config.translationPattern,
                rtlSupport: targetLang in config.rtlFieldMapping
            }
        };
    }
}
