/**
 * Length-ratio heuristic for translation quality, in [0, 1].
 * Used when the provider reports no score of its own.
 */
export function assessTranslationQuality(original: string, translation: string): number {
    if (!original || !translation) return 0;

    const lengthRatio = translation.length / original.length;
    if (lengthRatio < 0.3 || lengthRatio > 3.0) return 0.3;
    if (translation.toLowerCase() === original.toLowerCase()) return 0.2;

    let score = 0.7;
    if (lengthRatio >= 0.5 && lengthRatio <= 2.0) score = 0.8;
    if (lengthRatio >= 0.7 && lengthRatio <= 1.5) score = 0.9;
    return score;
}

/** Quality recorded for HTML fields translated node by node. */
export const HTML_QUALITY_SCORE = { ltr: 1.0, rtl: 0.9 } as const;
