import { FieldMappingConfig } from '../entities/FieldMapping';

/**
 * Field Config Repository Port
 *
 * Persistent storage of per-client, per-collection field mapping configs.
 */
export interface IFieldConfigRepository {
    findConfig(clientId: string, collectionName: string): Promise<FieldMappingConfig | null>;

    saveConfig(config: FieldMappingConfig): Promise<FieldMappingConfig>;

    /**
     * @returns true when a config was removed
     */
    deleteConfig(clientId: string, collectionName: string): Promise<boolean>;

    listConfigs(clientId: string): Promise<FieldMappingConfig[]>;
}
