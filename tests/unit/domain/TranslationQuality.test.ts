import { assessTranslationQuality } from '../../../src/domain/services/TranslationQuality';

describe('assessTranslationQuality', () => {
    it('should score empty input as zero', () => {
        expect(assessTranslationQuality('', 'x')).toBe(0);
        expect(assessTranslationQuality('x', '')).toBe(0);
    });

    it('should penalise extreme length ratios', () => {
        expect(assessTranslationQuality('abcdefghij', 'ab')).toBe(0.3);
        expect(assessTranslationQuality('ab', 'abcdefghij')).toBe(0.3);
    });

    it('should penalise untranslated text', () => {
        expect(assessTranslationQuality('hello', 'HELLO')).toBe(0.2);
    });

    it('should score by length ratio band', () => {
        expect(assessTranslationQuality('hello world', 'bonjour monde')).toBe(0.9);
        expect(assessTranslationQuality('abcdefghij', 'klmnopqrstuvwxyza')).toBe(0.8);
        expect(assessTranslationQuality('abcdefghij', 'k'.repeat(25))).toBe(0.7);
    });
});
