import { BatchTranslationFailure } from '../../domain/errors/TranslationErrors';
import { ITranslationPort, TranslationResult } from '../../domain/ports/ITranslationPort';
import { ResponseKeyParts } from './CacheKeys';
import { CacheWriteOptions, ResponseCache } from './ResponseCache';

const NO_OP_PROVIDER = 'noop';

export interface CachedTranslationOptions extends CacheWriteOptions {
    /** Scopes cache entries to one collection. */
    collection?: string;
}

/**
 * Cached Translation Adapter
 *
 * Wraps a translator with the response cache. Batches look every item up
 * first and send only the misses to the inner translator, in their
 * original order. Results produced by another provider (a fallback) or
 * by the no-op translator are returned but never stored.
 */
export class CachedTranslationAdapter implements ITranslationPort {
    constructor(
        private readonly inner: ITranslationPort,
        private readonly cache: ResponseCache,
        private readonly options: CachedTranslationOptions = {}
    ) { }

    get provider(): string {
        return this.inner.provider;
    }

    get model(): string {
        return this.inner.model;
    }

    private keyParts(text: string, sourceLang: string, targetLang: string, context?: string): ResponseKeyParts {
        return {
            provider: this.inner.provider,
            model: this.inner.model,
            sourceLang,
            targetLang,
            text,
            context,
            collection: this.options.collection
        };
    }

    async translate(text: string, sourceLang: string, targetLang: string, context?: string): Promise<TranslationResult> {
        const parts = this.keyParts(text, sourceLang, targetLang, context);
        const cached = await this.cache.get(parts);
        if (cached !== null) {
            return { translatedText: cached, fromCache: true };
        }

        const result = await this.inner.translate(text, sourceLang, targetLang, context);
        if (this.isCacheable(result)) {
            await this.cache.set(parts, result.translatedText, this.writeOptions(result));
        }
        return result;
    }

    async translateBatch(texts: string[], sourceLang: string, targetLang: string, context?: string): Promise<TranslationResult[]> {
        const byIndex = new Map<number, TranslationResult>();
        const missIndexes: number[] = [];

        for (const [index, text] of texts.entries()) {
            const cached = await this.cache.get(this.keyParts(text, sourceLang, targetLang, context));
            if (cached !== null) {
                byIndex.set(index, { translatedText: cached, fromCache: true });
            } else {
                missIndexes.push(index);
            }
        }

        if (missIndexes.length > 0) {
            const fresh = await this.inner.translateBatch(missIndexes.map(i => texts[i]), sourceLang, targetLang, context);
            if (fresh.length !== missIndexes.length) {
                throw new BatchTranslationFailure(missIndexes.length, `${this.inner.provider} returned ${fresh.length} results`);
            }
            for (const [position, index] of missIndexes.entries()) {
                const result = fresh[position];
                byIndex.set(index, result);
                if (!this.isCacheable(result)) continue;
                await this.cache.set(this.keyParts(texts[index], sourceLang, targetLang, context), result.translatedText, this.writeOptions(result));
            }
        }

        return texts.map((text, index) => byIndex.get(index) ?? { translatedText: text });
    }

    private isCacheable(result: TranslationResult): boolean {
        const source = result.provider ?? this.inner.provider;
        return source === this.inner.provider && source !== NO_OP_PROVIDER;
    }

    private writeOptions(result: TranslationResult): CacheWriteOptions {
        return {
            contentType: this.options.contentType,
            confidence: result.qualityScore ?? this.options.confidence
        };
    }
}
