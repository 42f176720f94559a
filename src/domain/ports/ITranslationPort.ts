/**
 * Translation Port Interface
 *
 * Defines the contract for translation providers. Language codes are
 * lower-case ISO codes (e.g., 'en', 'ar').
 */

export interface TranslationResult {
    translatedText: string;
    detectedSourceLanguage?: string;
    /** Provider-reported quality in [0, 1], when the provider has one. */
    qualityScore?: number;
    /** Provider that produced the text, when it is not the port's own. */
    provider?: string;
    /** Set when the result was served from the response cache. */
    fromCache?: boolean;
}

export interface ITranslationPort {
    /** Provider identifier, used in cache keys and statistics. */
    readonly provider: string;
    readonly model: string;

    /**
     * Translates text into the target language.
     * @param context - Optional instruction passed along with the text
     */
    translate(text: string, sourceLang: string, targetLang: string, context?: string): Promise<TranslationResult>;

    /**
     * Translates several texts; results keep the input order.
     * Rejects as a whole when any item fails.
     */
    translateBatch(texts: string[], sourceLang: string, targetLang: string, context?: string): Promise<TranslationResult[]>;
}
