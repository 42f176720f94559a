/**
 * Structured Translation Service
 *
 * Translates one CMS item field by field:
 *
 * 1. Load the field mapping config (no paths: content is returned unchanged)
 * 2. Extract the configured fields
 * 3. Translate batchable text in one batch call, falling back to
 *    one call per field when the batch fails
 * 4. Translate rich text node by node through the HTML codec
 * 5. Reassemble the output shape selected by the config
 *
 * A failing field keeps its original text and is reported in the
 * metadata; only invalid input is thrown.
 */

import { asContentDocument, cloneContent, ContentMap } from '../domain/entities/ContentValue';
import {
    ExtractedField,
    FieldMappingConfig,
    hasFieldPaths,
    RICH_TEXT_TYPES,
    STRUCTURED_TYPES
} from '../domain/entities/FieldMapping';
import { FieldTranslation, FieldTranslationMetadata, TranslationApproach } from '../domain/entities/FieldTranslation';
import {
    DEFAULT_SUPPORTED_LANGUAGES,
    getLanguageDirection,
    LanguageDirection,
    normalizeLanguageCode,
    supportsLanguagePair
} from '../domain/entities/Language';
import {
    BatchTranslationFailure,
    errorMessage,
    TranslationError,
    UnsupportedLanguagePairError
} from '../domain/errors/TranslationErrors';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';
import { ITranslationPort, TranslationResult } from '../domain/ports/ITranslationPort';
import { buildFragmentContext, decode, encode, stripExecutableContent, TextNode } from '../domain/services/HtmlTextNodeCodec';
import { assemble } from '../domain/services/ReconstructionEngine';
import {
    DEFAULT_MAX_CONTEXT_LENGTH,
    DEFAULT_MAX_TEXT_LENGTH,
    sanitizeContext,
    sanitizeText,
    TextSanitizer
} from '../domain/services/TextSanitizer';
import { buildRtlDisplayOptions } from '../domain/services/RtlDisplay';
import { assessTranslationQuality, HTML_QUALITY_SCORE } from '../domain/services/TranslationQuality';
import { CachedTranslationAdapter } from './cache/CachedTranslationAdapter';
import { ResponseCache } from './cache/ResponseCache';
import { FieldMappingService } from './FieldMappingService';

export const MISSING_CONFIG_WARNING = 'No field mapping configuration - content returned unchanged';

export interface StructuredTranslationOptions {
    sanitizer?: TextSanitizer;
    maxTextLength?: number;
    maxContextLength?: number;
    supportedLanguages?: readonly string[];
    /** When set, every translator is consulted through this cache. */
    responseCache?: ResponseCache;
    metrics?: IMetricsPort;
    /** Attach RTL display variants to translated fields of RTL targets. */
    rtlDisplayOptions?: boolean;
    now?: () => Date;
}

export interface FieldFailure {
    path: string;
    error: string;
}

export interface TranslationMetadata {
    clientId: string;
    collectionName: string;
    sourceLang: string;
    targetLang: string;
    providerUsed: string;
    modelUsed: string;
    fieldsTranslated: number;
    fieldsFailed: number;
    batchProcessing: boolean;
    batchFallback: boolean;
    languageDirection: LanguageDirection;
    processingTimeMs: number;
    /** True when any field kept its original text. */
    degraded: boolean;
    failures: FieldFailure[];
    warning?: string;
}

export interface StructuredTranslationResult {
    translatedContent: ContentMap;
    fieldTranslations: Record<string, FieldTranslation>;
    metadata: TranslationMetadata;
}

interface TranslationRequest {
    translator: ITranslationPort;
    config: FieldMappingConfig;
    sourceLang: string;
    targetLang: string;
}

interface TextField {
    field: ExtractedField;
    text: string;
}

export class StructuredTranslationService {
    private readonly sanitizer: TextSanitizer;
    private readonly maxTextLength: number;
    private readonly maxContextLength: number;
    private readonly supportedLanguages: readonly string[];
    private readonly now: () => Date;

    constructor(
        private readonly fieldMapping: FieldMappingService,
        private readonly defaultTranslator?: ITranslationPort,
        private readonly options: StructuredTranslationOptions = {}
    ) {
        this.sanitizer = options.sanitizer ?? sanitizeText;
        this.maxTextLength = options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH;
        this.maxContextLength = options.maxContextLength ?? DEFAULT_MAX_CONTEXT_LENGTH;
        this.supportedLanguages = options.supportedLanguages ?? DEFAULT_SUPPORTED_LANGUAGES;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * @throws InvalidContentError when `content` is not a document
     * @throws UnsupportedLanguagePairError
     */
    async translateStructuredContent(
        content: unknown,
        clientId: string,
        collectionName: string,
        sourceLang: string,
        targetLang: string,
        translator?: ITranslationPort
    ): Promise<StructuredTranslationResult> {
        const startTime = Date.now();
        const document = asContentDocument(content);
        const src = normalizeLanguageCode(sourceLang);
        const dst = normalizeLanguageCode(targetLang);

        if (!supportsLanguagePair(src, dst, this.supportedLanguages)) {
            throw new UnsupportedLanguagePairError(sourceLang, targetLang);
        }

        const baseTranslator = translator ?? this.defaultTranslator;
        if (!baseTranslator) {
            throw new TranslationError('No translator configured');
        }
        const activeTranslator = this.options.responseCache
            ? new CachedTranslationAdapter(baseTranslator, this.options.responseCache, { collection: collectionName })
            : baseTranslator;

        const config = await this.fieldMapping.getConfig(clientId, collectionName);
        const metadata: TranslationMetadata = {
            clientId,
            collectionName,
            sourceLang: src,
            targetLang: dst,
            providerUsed: baseTranslator.provider,
            modelUsed: baseTranslator.model,
            fieldsTranslated: 0,
            fieldsFailed: 0,
            batchProcessing: config.batchProcessing,
            batchFallback: false,
            languageDirection: getLanguageDirection(dst),
            processingTimeMs: 0,
            degraded: false,
            failures: []
        };

        if (!hasFieldPaths(config)) {
            console.warn(`[StructuredTranslation] ${clientId}:${collectionName}: ${MISSING_CONFIG_WARNING}`);
            metadata.warning = MISSING_CONFIG_WARNING;
            metadata.processingTimeMs = Date.now() - startTime;
            return { translatedContent: cloneContent(document), fieldTranslations: {}, metadata };
        }

        const extraction = await this.fieldMapping.extractWithCache(document, config, dst);
        const request: TranslationRequest = { translator: activeTranslator, config, sourceLang: src, targetLang: dst };

        const batchFields: TextField[] = [];
        const results = new Map<string, FieldTranslation>();

        for (const field of Object.values(extraction.fields)) {
            if (STRUCTURED_TYPES.has(field.type) || typeof field.value !== 'string' || !field.value.trim()) {
                continue;
            }
            const textField: TextField = { field, text: field.value };

            if (field.batchIndex !== undefined) {
                batchFields.push(textField);
            } else if (RICH_TEXT_TYPES.has(field.type) && config.preserveHtml) {
                results.set(field.path, await this.translateHtmlField(textField, request));
            } else {
                results.set(field.path, await this.translateSingle(textField, request, 'single'));
            }
        }

        if (batchFields.length > 0) {
            const batchResults = await this.translateBatchFields(batchFields, request);
            metadata.batchFallback = batchResults.fallback;
            for (const translation of batchResults.translations) {
                results.set(translation.path, translation);
            }
        }

        // field-path order
        const ordered = Object.keys(extraction.fields)
            .map(path => results.get(path))
            .filter((translation): translation is FieldTranslation => translation !== undefined);

        const withDisplay = this.options.rtlDisplayOptions && metadata.languageDirection === 'rtl';
        const fieldTranslations: Record<string, FieldTranslation> = {};
        for (const translation of ordered) {
            fieldTranslations[translation.path] = translation;
            if (translation.status === 'translated') {
                if (withDisplay) {
                    translation.displayOptions = buildRtlDisplayOptions(translation.translatedText);
                }
                metadata.fieldsTranslated++;
            } else {
                metadata.fieldsFailed++;
                metadata.failures.push({ path: translation.path, error: translation.error ?? 'unknown error' });
            }
        }
        metadata.degraded = metadata.fieldsFailed > 0
            || ordered.some(translation => (translation.metadata.textNodesFailed ?? 0) > 0);

        const translatedContent = assemble(document, ordered, config, dst, this.now());
        metadata.processingTimeMs = Date.now() - startTime;

        const tags = { client: clientId, collection: collectionName, provider: baseTranslator.provider };
        this.options.metrics?.incrementCounter(METRICS.FIELDS_TRANSLATED, tags, metadata.fieldsTranslated);
        this.options.metrics?.incrementCounter(METRICS.FIELDS_FAILED, tags, metadata.fieldsFailed);
        this.options.metrics?.recordDuration(METRICS.TRANSLATE_DURATION, metadata.processingTimeMs, tags);
        for (const translation of ordered) {
            if (translation.status !== 'translated') continue;
            this.options.metrics?.recordHistogram(METRICS.QUALITY_SCORE, translation.qualityScore, tags);
        }

        console.log(
            `[StructuredTranslation] ${clientId}:${collectionName} ${src}->${dst}: `
            + `${metadata.fieldsTranslated} translated, ${metadata.fieldsFailed} failed in ${metadata.processingTimeMs}ms`
        );

        return { translatedContent, fieldTranslations, metadata };
    }

    private prepareText(text: string, config: FieldMappingConfig): string {
        return config.contentSanitization ? this.sanitizer(text, this.maxTextLength) : text;
    }

    private buildTranslation(
        textField: TextField,
        request: TranslationRequest,
        result: TranslationResult,
        metadata: FieldTranslationMetadata
    ): FieldTranslation {
        return {
            path: textField.field.path,
            originalText: textField.text,
            translatedText: result.translatedText,
            status: 'translated',
            provider: request.translator.provider,
            model: request.translator.model,
            sourceLang: request.sourceLang,
            targetLang: request.targetLang,
            qualityScore: result.qualityScore ?? assessTranslationQuality(textField.text, result.translatedText),
            metadata: result.fromCache ? { ...metadata, fromCache: true } : metadata
        };
    }

    private buildFailure(
        textField: TextField,
        request: TranslationRequest,
        error: unknown,
        metadata: FieldTranslationMetadata
    ): FieldTranslation {
        return {
            path: textField.field.path,
            originalText: textField.text,
            translatedText: textField.text,
            status: 'failed',
            provider: request.translator.provider,
            model: request.translator.model,
            sourceLang: request.sourceLang,
            targetLang: request.targetLang,
            qualityScore: 0,
            metadata,
            error: errorMessage(error)
        };
    }

    private async translateSingle(
        textField: TextField,
        request: TranslationRequest,
        approach: TranslationApproach
    ): Promise<FieldTranslation> {
        const metadata: FieldTranslationMetadata = { approach };
        const text = this.prepareText(textField.text, request.config);
        if (!text) {
            return this.buildFailure(textField, request, 'Text empty after sanitization', metadata);
        }

        try {
            const result = await request.translator.translate(text, request.sourceLang, request.targetLang);
            return this.buildTranslation(textField, request, result, metadata);
        } catch (error) {
            console.warn(`[StructuredTranslation] Field ${textField.field.path} failed: ${errorMessage(error)}`);
            return this.buildFailure(textField, request, error, metadata);
        }
    }

    private async translateBatchFields(
        fields: TextField[],
        request: TranslationRequest
    ): Promise<{ translations: FieldTranslation[]; fallback: boolean }> {
        const texts = fields.map(f => this.prepareText(f.text, request.config));
        this.options.metrics?.recordGauge(METRICS.BATCH_SIZE, texts.length);

        try {
            if (texts.some(text => !text)) {
                throw new BatchTranslationFailure(texts.length, 'Text empty after sanitization');
            }
            const results = await request.translator.translateBatch(texts, request.sourceLang, request.targetLang);
            if (results.length !== texts.length) {
                throw new BatchTranslationFailure(texts.length, `expected ${texts.length} results, got ${results.length}`);
            }

            const translations = fields.map((field, index) => this.buildTranslation(field, request, results[index], {
                approach: 'batch',
                batchIndex: field.field.batchIndex ?? index,
                batchSize: fields.length
            }));
            return { translations, fallback: false };
        } catch (error) {
            console.warn(`[StructuredTranslation] Batch of ${fields.length} failed, translating fields one by one: ${errorMessage(error)}`);
            this.options.metrics?.incrementCounter(METRICS.BATCH_FALLBACKS, { provider: request.translator.provider });

            const translations: FieldTranslation[] = [];
            for (const field of fields) {
                translations.push(await this.translateSingle(field, request, 'sequential_fallback'));
            }
            return { translations, fallback: true };
        }
    }

    /**
     * Translates each distinct text run once and writes the results back
     * into the markup. A failing run keeps its original text.
     */
    private async translateHtmlField(textField: TextField, request: TranslationRequest): Promise<FieldTranslation> {
        const direction = getLanguageDirection(request.targetLang);
        const approach: TranslationApproach = direction === 'rtl' ? 'node_by_node_rtl' : 'fragment_based_ltr';

        let html = textField.text;
        let nodes: TextNode[];
        try {
            if (request.config.contentSanitization) {
                html = stripExecutableContent(html);
            }
            nodes = decode(html);
        } catch (error) {
            console.warn(`[StructuredTranslation] Could not parse HTML in ${textField.field.path}, translating as text: ${errorMessage(error)}`);
            return this.translateSingle(textField, request, 'single');
        }

        const uniqueTexts = [...new Set(nodes.map(node => node.text))];
        const translated = new Map<string, string>();
        const errors: string[] = [];
        let fromCache = uniqueTexts.length > 0;

        for (const text of uniqueTexts) {
            const prepared = this.prepareText(text, request.config);
            if (!prepared) {
                errors.push(`Text node "${text.substring(0, 30)}" empty after sanitization`);
                continue;
            }
            const context = sanitizeContext(buildFragmentContext(prepared, request.targetLang), this.maxContextLength, this.sanitizer);
            try {
                const result = await request.translator.translate(prepared, request.sourceLang, request.targetLang, context);
                translated.set(text, result.translatedText);
                fromCache = fromCache && result.fromCache === true;
            } catch (error) {
                console.warn(`[StructuredTranslation] Text node in ${textField.field.path} failed: ${errorMessage(error)}`);
                errors.push(errorMessage(error));
            }
        }

        const metadata: FieldTranslationMetadata = {
            approach,
            htmlPreserved: true,
            textNodes: uniqueTexts.length,
            textNodesFailed: errors.length
        };

        if (uniqueTexts.length > 0 && translated.size === 0) {
            return this.buildFailure(textField, request, errors.join('; '), metadata);
        }

        return this.buildTranslation(textField, request, {
            translatedText: translated.size > 0 ? encode(html, translated) : html,
            qualityScore: HTML_QUALITY_SCORE[direction],
            fromCache
        }, metadata);
    }
}
