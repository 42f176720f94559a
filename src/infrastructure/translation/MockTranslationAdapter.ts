import { ITranslationPort, TranslationResult } from '../../domain/ports/ITranslationPort';
import { TranslationFailure } from '../../domain/errors/TranslationErrors';

export type TextTransform = (text: string, targetLang: string) => string;

export interface MockTranslationOptions {
    provider?: string;
    model?: string;
    /** Default: prefixes the text with `[LANG] `. */
    transform?: TextTransform;
    /** Texts for which translate() rejects. */
    failWhen?: (text: string) => boolean;
    qualityScore?: number;
}

/**
 * Mock Translation Adapter
 *
 * Deterministic in-process translator for development and tests.
 * translateBatch fans out one translate() call per item, so a single
 * failing item rejects the whole batch.
 */
export class MockTranslationAdapter implements ITranslationPort {
    readonly provider: string;
    readonly model: string;
    private readonly transform: TextTransform;
    private readonly failWhen: (text: string) => boolean;
    private readonly qualityScore?: number;

    constructor(options: MockTranslationOptions = {}) {
        this.provider = options.provider ?? 'mock';
        this.model = options.model ?? 'mock-model';
        this.transform = options.transform ?? ((text, targetLang) => `[${targetLang.toUpperCase()}] ${text}`);
        this.failWhen = options.failWhen ?? (() => false);
        this.qualityScore = options.qualityScore;
    }

    async translate(text: string, sourceLang: string, targetLang: string): Promise<TranslationResult> {
        if (this.failWhen(text)) {
            throw new TranslationFailure(this.provider, `Could not translate "${text.substring(0, 50)}"`);
        }
        const result: TranslationResult = {
            translatedText: this.transform(text, targetLang),
            detectedSourceLanguage: sourceLang
        };
        if (this.qualityScore !== undefined) result.qualityScore = this.qualityScore;
        return result;
    }

    async translateBatch(texts: string[], sourceLang: string, targetLang: string): Promise<TranslationResult[]> {
        return Promise.all(texts.map(t => this.translate(t, sourceLang, targetLang)));
    }
}

/** Returns every text unchanged. */
export const identityTransform: TextTransform = text => text;
