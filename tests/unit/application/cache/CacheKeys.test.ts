import {
    fieldExtractionKey,
    fieldValidationKey,
    responseKey,
    responseKeyPattern,
    responseStatsKey
} from '../../../../src/application/cache/CacheKeys';
import { calculateTtl, clampConfidence, getCostTier } from '../../../../src/application/cache/CachePolicy';
import { digest } from '../../../../src/domain/services/Hashing';

describe('CacheKeys', () => {
    const parts = { provider: 'openai', model: 'gpt-4', sourceLang: 'en', targetLang: 'fr', text: 'Hello' };

    it('should address responses by provider, model, target and content hash', () => {
        expect(responseKey(parts)).toBe(`ai_response:v1:openai:gpt-4:fr:${digest('en:fr::Hello')}`);
    });

    it('should include the context in the content hash', () => {
        expect(responseKey({ ...parts, context: 'formal' })).toBe(`ai_response:v1:openai:gpt-4:fr:${digest('en:fr:formal:Hello')}`);
    });

    it('should append the collection scope', () => {
        expect(responseKey({ ...parts, collection: 'blog' })).toBe(`${responseKey(parts)}:collection:blog`);
    });

    it('should build patterns with wildcards for omitted parts', () => {
        expect(responseKeyPattern()).toBe('ai_response:v1:*:*:*:*');
        expect(responseKeyPattern({ provider: 'openai', language: 'de' })).toBe('ai_response:v1:openai:*:de:*');
        expect(responseKeyPattern({ collection: 'blog' })).toBe('ai_response:v1:*:*:*:*:collection:blog');
    });

    it('should name hit and miss counters', () => {
        expect(responseStatsKey('openai', 'gpt-4', 'hits')).toBe('cache_stats:openai:gpt-4:hits');
    });

    it('should hash content independently of key order', () => {
        expect(fieldExtractionKey('h', { a: 1, b: { c: 2, d: 3 } }))
            .toBe(fieldExtractionKey('h', { b: { d: 3, c: 2 }, a: 1 }));
        expect(fieldExtractionKey('h', { a: 1 }, 'fr')).toBe(`${fieldExtractionKey('h', { a: 1 })}:fr`);
    });

    it('should key validation reports on the sample content too', () => {
        expect(fieldValidationKey('c1', 'articles', ['title'], { title: 'a' }))
            .not.toBe(fieldValidationKey('c1', 'articles', ['title'], { title: 'b' }));
    });
});

describe('CachePolicy', () => {
    it('should look cost tiers up case-insensitively', () => {
        expect(getCostTier('OpenAI', 'GPT-4')).toBe('high');
        expect(getCostTier('anthropic', 'claude-3-opus')).toBe('very_high');
        expect(getCostTier('mistral', 'mistral-tiny')).toBe('low');
    });

    it('should price unknown providers and models as medium', () => {
        expect(getCostTier('acme', 'gpt-4')).toBe('medium');
        expect(getCostTier('openai', 'gpt-9')).toBe('medium');
    });

    it('should clamp confidence to [0.5, 1.5]', () => {
        expect(clampConfidence(0.1)).toBe(0.5);
        expect(clampConfidence(1.2)).toBe(1.2);
        expect(clampConfidence(3)).toBe(1.5);
    });

    it('should combine content, cost and confidence factors', () => {
        expect(calculateTtl(86400, { provider: 'openai', model: 'gpt-4', contentType: 'critical', confidence: 0.1 })).toBe(32400);
        expect(calculateTtl(3600, { provider: 'anthropic', model: 'claude-3-opus', contentType: 'static' })).toBe(50400);
    });

    it('should never return less than one second', () => {
        expect(calculateTtl(1, { provider: 'openai', model: 'gpt-3.5-turbo', contentType: 'temporary' })).toBe(1);
    });
});
