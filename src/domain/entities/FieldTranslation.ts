import { RtlDisplayOptions } from '../services/RtlDisplay';

/**
 * Outcome of translating one field (a plain value, a batch item or an
 * HTML field translated node by node).
 */

export type TranslationStatus = 'translated' | 'failed';

export type TranslationApproach =
    | 'single'
    | 'batch'
    | 'sequential_fallback'
    | 'fragment_based_ltr'
    | 'node_by_node_rtl';

export interface FieldTranslationMetadata {
    approach: TranslationApproach;
    batchIndex?: number;
    batchSize?: number;
    fromCache?: boolean;
    htmlPreserved?: boolean;
    textNodes?: number;
    textNodesFailed?: number;
}

export interface FieldTranslation {
    path: string;
    originalText: string;
    /** Equals originalText when the unit failed. */
    translatedText: string;
    status: TranslationStatus;
    provider: string;
    model: string;
    sourceLang: string;
    targetLang: string;
    qualityScore: number;
    metadata: FieldTranslationMetadata;
    error?: string;
    /** Only for translated RTL fields, when display options are enabled. */
    displayOptions?: RtlDisplayOptions;
}

export function isTranslated(translation: FieldTranslation): boolean {
    return translation.status === 'translated';
}
