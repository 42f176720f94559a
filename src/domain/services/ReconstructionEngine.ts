/**
 * Reconstruction Engine
 *
 * Puts translated fields back into one of the supported CMS output shapes:
 *
 * - merge_in_place: the original document with translated paths overwritten
 * - collection_translations: a row for a `<collection>_translations` table
 * - language_collections: a row for a per-language collection
 */

import { cloneContent, ContentMap, ContentValue } from '../entities/ContentValue';
import { FieldMappingConfig } from '../entities/FieldMapping';
import { FieldTranslation, isTranslated } from '../entities/FieldTranslation';
import { leafName, setPath } from './PathResolver';

export const TRANSLATION_METADATA_KEY = '_translation_metadata';

export interface ProviderStats {
    providers: Record<string, { count: number; qualityScores: number[]; avgQuality: number }>;
    overallAvgQuality: number;
}

function average(values: number[]): number {
    return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

export function computeProviderStats(translations: FieldTranslation[]): ProviderStats {
    const providers: ProviderStats['providers'] = {};
    const allScores: number[] = [];

    for (const translation of translations.filter(isTranslated)) {
        const entry = providers[translation.provider] ?? { count: 0, qualityScores: [], avgQuality: 0 };
        entry.count++;
        entry.qualityScores.push(translation.qualityScore);
        providers[translation.provider] = entry;
        allScores.push(translation.qualityScore);
    }

    for (const entry of Object.values(providers)) {
        entry.avgQuality = average(entry.qualityScores);
    }

    return { providers, overallAvgQuality: average(allScores) };
}

/**
 * Leaf names shared by more than one path. Sidecar shapes keep only the
 * last of them.
 */
export function findLeafCollisions(paths: string[]): Record<string, string[]> {
    const byLeaf = new Map<string, string[]>();
    for (const path of paths) {
        const leaf = leafName(path);
        byLeaf.set(leaf, [...(byLeaf.get(leaf) ?? []), path]);
    }

    const collisions: Record<string, string[]> = {};
    for (const [leaf, group] of byLeaf) {
        if (group.length > 1) collisions[leaf] = group;
    }
    return collisions;
}

function statsToContent(stats: ProviderStats): ContentMap {
    const providers: ContentMap = {};
    for (const [name, entry] of Object.entries(stats.providers)) {
        providers[name] = {
            count: entry.count,
            quality_scores: entry.qualityScores,
            avg_quality: entry.avgQuality
        };
    }
    return { providers, overall_avg_quality: stats.overallAvgQuality };
}

function writeLeaves(target: ContentMap, translations: FieldTranslation[]): void {
    const collisions = findLeafCollisions(translations.map(t => t.path));
    for (const [leaf, paths] of Object.entries(collisions)) {
        console.warn(`[Reconstruction] Paths ${paths.join(', ')} share the leaf "${leaf}"; keeping ${paths[paths.length - 1]}`);
    }

    for (const translation of translations) {
        target[leafName(translation.path)] = translation.translatedText;
    }
}

function mergeInPlace(
    original: ContentMap,
    translations: FieldTranslation[],
    targetLang: string,
    now: Date
): ContentMap {
    const result = cloneContent(original);

    for (const translation of translations) {
        if (!setPath(result, translation.path, translation.translatedText)) {
            console.warn(`[Reconstruction] Could not write translated value at ${translation.path}`);
        }
    }

    result[TRANSLATION_METADATA_KEY] = {
        translated_at: now.toISOString(),
        target_language: targetLang,
        fields_translated: translations.filter(isTranslated).map(t => t.path),
        provider_stats: statsToContent(computeProviderStats(translations))
    };

    return result;
}

function originalId(original: ContentMap): ContentValue {
    return original.id ?? null;
}

/**
 * Assembles the output document. `original` is never mutated.
 */
export function assemble(
    original: ContentMap,
    translations: FieldTranslation[],
    config: FieldMappingConfig,
    targetLang: string,
    now: Date = new Date()
): ContentMap {
    switch (config.translationPattern) {
        case 'merge_in_place':
            return mergeInPlace(original, translations, targetLang, now);

        case 'collection_translations': {
            const primary = config.primaryCollection ?? config.collectionName;
            const result: ContentMap = {
                id: null,
                [`${primary}_id`]: originalId(original),
                languages_code: targetLang
            };
            writeLeaves(result, translations);
            return result;
        }

        case 'language_collections': {
            const result: ContentMap = { id: originalId(original) };
            writeLeaves(result, translations);
            return result;
        }
    }
}
