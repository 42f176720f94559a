/**
 * In-Memory Field Config Repository
 *
 * Keeps field mapping configs per (client, collection) in a Map.
 * Stored configs are copied on the way in and out.
 */

import { FieldMappingConfig } from '../../domain/entities/FieldMapping';
import { IFieldConfigRepository } from '../../domain/ports/IFieldConfigRepository';

function configKey(clientId: string, collectionName: string): string {
    return `${clientId}:${collectionName}`;
}

export class InMemoryFieldConfigRepository implements IFieldConfigRepository {
    private configs: Map<string, FieldMappingConfig> = new Map();

    constructor(initial: FieldMappingConfig[] = []) {
        for (const config of initial) {
            this.configs.set(configKey(config.clientId, config.collectionName), structuredClone(config));
        }
    }

    async findConfig(clientId: string, collectionName: string): Promise<FieldMappingConfig | null> {
        const config = this.configs.get(configKey(clientId, collectionName));
        return config ? structuredClone(config) : null;
    }

    async saveConfig(config: FieldMappingConfig): Promise<FieldMappingConfig> {
        this.configs.set(configKey(config.clientId, config.collectionName), structuredClone(config));
        return structuredClone(config);
    }

    async deleteConfig(clientId: string, collectionName: string): Promise<boolean> {
        return this.configs.delete(configKey(clientId, collectionName));
    }

    async listConfigs(clientId: string): Promise<FieldMappingConfig[]> {
        return [...this.configs.values()]
            .filter(config => config.clientId === clientId)
            .sort((a, b) => a.collectionName.localeCompare(b.collectionName))
            .map(config => structuredClone(config));
    }
}
