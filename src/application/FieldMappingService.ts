/**
 * Field Mapping Service
 *
 * Owns field mapping configs (repository + cache) and runs extraction,
 * path validation and previews against them.
 *
 * Config lookup order: cache, repository, then the default config.
 */

import { ContentMap } from '../domain/entities/ContentValue';
import {
    createDefaultFieldMappingConfig,
    ExtractionResult,
    FieldMappingConfig
} from '../domain/entities/FieldMapping';
import { IFieldConfigRepository } from '../domain/ports/IFieldConfigRepository';
import { parseFieldMappingConfig } from '../domain/services/FieldMappingConfigParser';
import {
    ExtractionPreview,
    FieldExtractor,
    PathValidationReport
} from '../domain/services/FieldExtractor';
import { FieldMappingCache } from './cache/FieldMappingCache';

export class FieldMappingService {
    constructor(
        private readonly repository: IFieldConfigRepository,
        private readonly extractor: FieldExtractor,
        private readonly cache?: FieldMappingCache
    ) { }

    async getConfig(clientId: string, collectionName: string): Promise<FieldMappingConfig> {
        const cached = await this.cache?.getConfig(clientId, collectionName);
        if (cached) return cached;

        const stored = await this.repository.findConfig(clientId, collectionName);
        if (!stored) {
            return createDefaultFieldMappingConfig(clientId, collectionName);
        }

        await this.cache?.setConfig(stored);
        return stored;
    }

    /**
     * Validates and stores a config, replacing any cached copy.
     * @throws ConfigValidationError
     */
    async saveConfig(raw: unknown): Promise<FieldMappingConfig> {
        const config = parseFieldMappingConfig(raw);
        const saved = await this.repository.saveConfig(config);

        if (this.cache) {
            await this.cache.invalidateClient(saved.clientId, saved.collectionName);
            await this.cache.setConfig(saved);
        }

        console.log(`[FieldMapping] Saved config for ${saved.clientId}:${saved.collectionName} (${saved.fieldPaths.length} paths)`);
        return saved;
    }

    async deleteConfig(clientId: string, collectionName: string): Promise<boolean> {
        const deleted = await this.repository.deleteConfig(clientId, collectionName);
        await this.cache?.invalidateClient(clientId, collectionName);
        return deleted;
    }

    async listConfigs(clientId: string): Promise<FieldMappingConfig[]> {
        return this.repository.listConfigs(clientId);
    }

    extract(content: ContentMap, config: FieldMappingConfig, language?: string): ExtractionResult {
        return this.extractor.extract(content, config, language);
    }

    /**
     * Extraction backed by the extraction cache.
     */
    async extractWithCache(content: ContentMap, config: FieldMappingConfig, language?: string): Promise<ExtractionResult> {
        const cached = await this.cache?.getExtraction(content, config, language);
        if (cached) return cached;

        const result = this.extractor.extract(content, config, language);
        await this.cache?.setExtraction(content, config, result, language);
        return result;
    }

    async validateFieldPaths(
        clientId: string,
        collectionName: string,
        content: ContentMap,
        paths: string[]
    ): Promise<PathValidationReport> {
        const cached = await this.cache?.getValidation(clientId, collectionName, paths, content);
        if (cached) return cached;

        const report = this.extractor.validateFieldPaths(content, paths);
        await this.cache?.setValidation(clientId, collectionName, paths, content, report);
        return report;
    }

    /**
     * What would be translated for `targetLang`; nothing is translated.
     */
    preview(content: ContentMap, config: FieldMappingConfig, targetLang: string): ExtractionPreview {
        const extraction = this.extractor.extract(content, config, targetLang);
        return this.extractor.buildPreview(extraction, config, targetLang);
    }

    async previewForCollection(
        content: ContentMap,
        clientId: string,
        collectionName: string,
        targetLang: string
    ): Promise<ExtractionPreview> {
        const config = await this.getConfig(clientId, collectionName);
        return this.preview(content, config, targetLang);
    }
}
