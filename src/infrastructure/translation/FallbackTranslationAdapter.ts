import { ITranslationPort, TranslationResult } from '../../domain/ports/ITranslationPort';

/**
 * Fallback Translation Adapter
 *
 * Tries the primary provider and, when it rejects, the secondary one.
 * Cache keys and statistics are attributed to the primary provider;
 * results from the secondary carry its name in `provider`.
 */
export class FallbackTranslationAdapter implements ITranslationPort {
    constructor(
        private readonly primary: ITranslationPort,
        private readonly secondary: ITranslationPort
    ) { }

    get provider(): string {
        return this.primary.provider;
    }

    get model(): string {
        return this.primary.model;
    }

    async translate(text: string, sourceLang: string, targetLang: string, context?: string): Promise<TranslationResult> {
        try {
            return await this.primary.translate(text, sourceLang, targetLang, context);
        } catch (error) {
            console.warn(`[${this.primary.provider}] Translation failed, falling back to ${this.secondary.provider}:`, error);
            return this.fromSecondary(await this.secondary.translate(text, sourceLang, targetLang, context));
        }
    }

    async translateBatch(texts: string[], sourceLang: string, targetLang: string, context?: string): Promise<TranslationResult[]> {
        try {
            return await this.primary.translateBatch(texts, sourceLang, targetLang, context);
        } catch (error) {
            console.warn(`[${this.primary.provider}] Batch translation failed, falling back to ${this.secondary.provider}:`, error);
            const results = await this.secondary.translateBatch(texts, sourceLang, targetLang, context);
            return results.map(result => this.fromSecondary(result));
        }
    }

    private fromSecondary(result: TranslationResult): TranslationResult {
        return { ...result, provider: result.provider ?? this.secondary.provider };
    }
}

/**
 * No-Op Translation Adapter
 *
 * Returns the original text. Useful as an ultimate fallback to prevent pipeline failure.
 */
export class NoOpTranslationAdapter implements ITranslationPort {
    readonly provider = 'noop';
    readonly model = 'none';

    async translate(text: string): Promise<TranslationResult> {
        return { translatedText: text, provider: this.provider };
    }

    async translateBatch(texts: string[]): Promise<TranslationResult[]> {
        return texts.map(t => ({ translatedText: t, provider: this.provider }));
    }
}
