/**
 * Language codes and text direction.
 */

export type LanguageDirection = 'ltr' | 'rtl';

export const RTL_LANGUAGES: ReadonlySet<string> = new Set([
    'ar', 'he', 'fa', 'ur', 'yi', 'ji', 'iw', 'ku', 'ps', 'sd'
]);

/**
 * Languages accepted by default when validating a language pair.
 */
export const DEFAULT_SUPPORTED_LANGUAGES: readonly string[] = [
    'en', 'ar', 'bs', 'es', 'fr', 'de', 'it', 'pt', 'ru', 'zh',
    'ja', 'ko', 'hi', 'tr', 'pl', 'nl', 'sv', 'da', 'no', 'fi',
    'he', 'fa', 'ur'
];

export function normalizeLanguageCode(code: string): string {
    return code.trim().toLowerCase();
}

export function isRtlLanguage(code: string): boolean {
    return RTL_LANGUAGES.has(normalizeLanguageCode(code));
}

export function getLanguageDirection(code: string): LanguageDirection {
    return isRtlLanguage(code) ? 'rtl' : 'ltr';
}

export function supportsLanguagePair(
    sourceLang: string,
    targetLang: string,
    supported: readonly string[] = DEFAULT_SUPPORTED_LANGUAGES
): boolean {
    return supported.includes(normalizeLanguageCode(sourceLang))
        && supported.includes(normalizeLanguageCode(targetLang));
}
