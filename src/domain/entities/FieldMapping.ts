/**
 * Field Mapping Entities
 *
 * Describes which fields of a collection are translatable, how they are typed,
 * and which output shape reconstructed translations take.
 */

import { ContentValue } from './ContentValue';
import { canonicalJson, digest } from '../services/Hashing';

export const FIELD_TYPES = [
    'text',
    'wysiwyg',
    'textarea',
    'string',
    'relation',
    'json',
    'markdown',
    'html'
] as const;

export type FieldType = typeof FIELD_TYPES[number];

export const TRANSLATION_PATTERNS = [
    'merge_in_place',
    'collection_translations',
    'language_collections'
] as const;

export type TranslationPattern = typeof TRANSLATION_PATTERNS[number];

/** Field types whose values are HTML and go through the text-node codec. */
export const RICH_TEXT_TYPES: ReadonlySet<FieldType> = new Set<FieldType>(['wysiwyg', 'html']);

/** Field types that are never sent to the translator as text. */
export const STRUCTURED_TYPES: ReadonlySet<FieldType> = new Set<FieldType>(['json', 'relation']);

/** Plain-text field types that may be grouped into one batch call. */
export const BATCHABLE_TYPES: ReadonlySet<FieldType> = new Set<FieldType>(['text', 'string', 'textarea']);

export interface RtlFieldOverride {
    fieldPaths: string[];
}

export interface FieldMappingConfig {
    clientId: string;
    collectionName: string;
    /** Ordered; this order is also the batch order. */
    fieldPaths: string[];
    fieldTypes: Record<string, FieldType>;
    /** Per-language replacement of fieldPaths, applied for RTL targets only. */
    rtlFieldMapping: Record<string, RtlFieldOverride>;
    batchProcessing: boolean;
    preserveHtml: boolean;
    contentSanitization: boolean;
    translationPattern: TranslationPattern;
    primaryCollection: string | null;
}

export type FieldMappingConfigInput =
    Pick<FieldMappingConfig, 'clientId' | 'collectionName'>
    & Partial<Omit<FieldMappingConfig, 'clientId' | 'collectionName'>>;

export interface HtmlStructure {
    tags: string[];
    classes: string[];
    attributes: Record<string, string[]>;
}

export interface FieldMetadata {
    htmlStructure?: HtmlStructure;
}

export interface ExtractedField {
    path: string;
    value: ContentValue;
    type: FieldType;
    metadata: FieldMetadata;
    batchIndex?: number;
}

export interface BatchMappingEntry {
    index: number;
    type: FieldType;
}

/**
 * The `__batch__` group: plain-text values in field-path order.
 */
export interface BatchGroup {
    texts: string[];
    mapping: Record<string, BatchMappingEntry>;
}

export interface ExtractionResult {
    fields: Record<string, ExtractedField>;
    batch?: BatchGroup;
}

export const BATCH_GROUP_KEY = '__batch__';

export function createDefaultFieldMappingConfig(clientId: string, collectionName: string): FieldMappingConfig {
    return {
        clientId,
        collectionName,
        fieldPaths: [],
        fieldTypes: {},
        rtlFieldMapping: {},
        batchProcessing: false,
        preserveHtml: true,
        contentSanitization: true,
        translationPattern: 'collection_translations',
        primaryCollection: null
    };
}

export function computeConfigHash(config: FieldMappingConfig): string {
    return digest(canonicalJson(config));
}

export function hasFieldPaths(config: FieldMappingConfig): boolean {
    return config.fieldPaths.length > 0;
}
